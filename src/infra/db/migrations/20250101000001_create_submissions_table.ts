/**
 * Migration: Create Submissions Table
 *
 * Type and scope are copied from the questionnaire at submit time, so a
 * submission keeps its meaning after the questionnaire is gone.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('submissions', (table) => {
    table.increments('id').primary();

    table.string('submission_status', 20).notNullable().defaultTo('submitted');
    table
      .integer('questionnaire_id')
      .unsigned()
      .nullable()
      .references('id')
      .inTable('questionnaires')
      .onDelete('SET NULL');
    table.string('questionnaire_type', 20).notNullable();
    table.string('questionnaire_scope', 20).notNullable();
    table.integer('user_id').unsigned().nullable();
    table.json('payload').notNullable();
    table.boolean('is_failed').notNullable().defaultTo(false);
    table.boolean('is_orphan').notNullable().defaultTo(false);
    table.integer('staff_id').unsigned().nullable();

    table.timestamp('submitted_at').notNullable().defaultTo(knex.fn.now());
    table.timestamp('patched_at').notNullable().defaultTo(knex.fn.now());

    table.index(['submission_status'], 'idx_submissions_status');
    table.index(['user_id'], 'idx_submissions_user_id');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('submissions');
}
