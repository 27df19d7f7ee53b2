/**
 * Seed: Questionnaire Data
 *
 * One public verification questionnaire with two questions.
 * Useful for development and testing.
 *
 * Run: npx knex seed:run
 */
import type { Knex } from 'knex';

export async function seed(knex: Knex): Promise<void> {
  // Clear existing entries
  await knex('submissions').del();
  await knex('questionnaire_items').del();
  await knex('questions').del();
  await knex('questionnaires').del();

  const [questionnaireId] = await knex('questionnaires').insert({
    name: 'Identity Verification',
    about: 'Basic identity checks',
    questionnaire_type: 'verification',
    questionnaire_scope: 'public',
  });

  const [fullNameId] = await knex('questions').insert({
    question_type: 'text',
    reference_code: 'full_name',
    text: 'What is your full name?',
    validation_rules: JSON.stringify({ required: true, maxLength: 120 }),
  });

  const [birthDateId] = await knex('questions').insert({
    question_type: 'date',
    reference_code: 'birth_date',
    text: 'What is your date of birth?',
    validation_rules: JSON.stringify({ required: true }),
  });

  await knex('questionnaire_items').insert([
    { questionnaire_id: questionnaireId, question_id: fullNameId, order_index: 0 },
    { questionnaire_id: questionnaireId, question_id: birthDateId, order_index: 1 },
  ]);
}
