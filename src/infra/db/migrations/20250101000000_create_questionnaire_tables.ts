/**
 * Migration: Create Questionnaire Tables
 *
 * Questionnaires, reusable questions and the ordered link between them.
 *
 * Run: npm run migrate
 * Rollback: npm run migrate:rollback
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('questionnaires', (table) => {
    table.increments('id').primary();

    table.string('name', 255).notNullable().unique();
    table.string('about', 255).nullable();
    table.string('questionnaire_type', 20).notNullable();
    table.string('questionnaire_scope', 20).notNullable().defaultTo('draft');
    table.integer('staff_id').unsigned().nullable();

    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());

    table.index(['questionnaire_scope'], 'idx_questionnaires_scope');
    table.index(['questionnaire_type'], 'idx_questionnaires_type');
  });

  await knex.schema.createTable('questions', (table) => {
    table.increments('id').primary();

    table.string('question_type', 20).notNullable();
    table.string('reference_code', 50).notNullable().unique();
    table.string('text', 255).notNullable();
    table.json('validation_rules').notNullable();
    table.integer('staff_id').unsigned().nullable();

    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('questionnaire_items', (table) => {
    table.increments('id').primary();

    table
      .integer('questionnaire_id')
      .unsigned()
      .notNullable()
      .references('id')
      .inTable('questionnaires')
      .onDelete('CASCADE');
    table
      .integer('question_id')
      .unsigned()
      .notNullable()
      .references('id')
      .inTable('questions')
      .onDelete('CASCADE');
    table.integer('order_index').unsigned().notNullable().defaultTo(0);

    table.unique(['questionnaire_id', 'question_id'], {
      indexName: 'uq_questionnaire_items_pair',
    });
    table.index(['questionnaire_id', 'order_index'], 'idx_questionnaire_items_order');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('questionnaire_items');
  await knex.schema.dropTableIfExists('questions');
  await knex.schema.dropTableIfExists('questionnaires');
}
