import type { Knex } from 'knex';

/**
 * History of report generation runs.
 *
 * - status: 'success' | 'partial' | 'failed'
 * - details: JSON with artifact names written/failed and incomplete hosts
 */
export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('report_runs', (t) => {
    t.uuid('id').primary();
    t.timestamp('started_at', { useTz: true }).notNullable();
    t.timestamp('finished_at', { useTz: true }).notNullable();
    t.integer('duration_ms').notNullable();
    t.string('status', 16).notNullable();
    t.integer('artifacts_written').notNullable().defaultTo(0);
    t.integer('artifacts_failed').notNullable().defaultTo(0);
    t.jsonb('details').notNullable().defaultTo('{}');
    t.text('error').nullable();
    t.index(['started_at']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('report_runs');
}
