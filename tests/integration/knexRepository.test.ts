import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { knex, type Knex } from 'knex';
import { up as createQuestionnaireTables } from '../../src/infra/db/migrations/20250101000000_create_questionnaire_tables.js';
import { bindModelManagers, managerOptions } from '../../src/infra/db/database.js';
import { QuestionnaireRepository } from '../../src/infra/db/repositories/QuestionnaireRepository.js';
import { CacheManager } from '../../src/infra/cache/CacheManager.js';
import { MemoryCacheStore } from '../../src/infra/cache/MemoryCacheStore.js';
import { RepositoryOperationError } from '../../src/shared/errors/index.js';
import {
  QuestionModel,
  QuestionnaireItemModel,
  QuestionnaireModel,
  SubmissionModel,
  type Questionnaire,
} from '../../src/domain/models/index.js';
import { captureLogger, LEVEL, type LogLine } from '../helpers/testModel.js';

describe('QuestionnaireRepository over Knex (SQLite)', () => {
  let db: Knex;
  let repository: QuestionnaireRepository;
  let lines: LogLine[];

  beforeEach(async () => {
    db = knex({
      client: 'better-sqlite3',
      connection: { filename: ':memory:' },
      useNullAsDefault: true,
      pool: { min: 1, max: 1 },
    });
    await createQuestionnaireTables(db);
    bindModelManagers(db, managerOptions('better-sqlite3'));

    const captured = captureLogger();
    lines = captured.lines;
    repository = new QuestionnaireRepository({
      cacheEnabled: true,
      cacheManager: new CacheManager(new MemoryCacheStore(), 900),
      logger: captured.logger,
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    for (const model of [QuestionnaireModel, QuestionModel, QuestionnaireItemModel, SubmissionModel]) {
      model.unbindManager();
    }
    await db.destroy();
  });

  const seed = (): Promise<Questionnaire[]> =>
    repository.bulkCreate(
      [
        { name: 'kyc', questionnaireType: 'verification' },
        { name: 'aml', questionnaireType: 'verification' },
        { name: 'feedback', questionnaireType: 'regular' },
      ].map((fields) =>
        QuestionnaireModel.build(
          QuestionnaireModel.parseFields({ ...fields, questionnaireScope: 'public' })
        )
      ),
      2
    );

  it('should create in batches and read back in id order', async () => {
    const created = await seed();

    expect(created.map((questionnaire) => questionnaire.id)).toEqual([1, 2, 3]);
    expect((await repository.getAll()).map((questionnaire) => questionnaire.name)).toEqual([
      'kyc',
      'aml',
      'feedback',
    ]);
  });

  it('should persist a valid update', async () => {
    await seed();

    const updated = await repository.update(2, { about: 'Screening' });

    expect(updated?.about).toBe('Screening');
    const row: Record<string, unknown> | undefined = await db('questionnaires')
      .where('id', 2)
      .first();
    expect(row?.about).toBe('Screening');
  });

  it('should reject an invalid update and keep the table readable', async () => {
    await seed();

    await expect(repository.update(1, { staffId: -1 })).rejects.toBeInstanceOf(
      RepositoryOperationError
    );

    expect((await repository.getById(1))?.staffId).toBeNull();
    expect(await repository.getAll()).toHaveLength(3);
    expect((await repository.paginate(1, 2)).entities).toHaveLength(2);
  });

  it('should apply bulk updates to the named fields only', async () => {
    const created = await seed();
    for (const questionnaire of created) {
      questionnaire.applyFields({ questionnaireScope: 'assigned', about: 'ignored' });
    }

    const updated = await repository.bulkUpdate(created, ['questionnaireScope'], 2);

    expect(updated).toHaveLength(3);
    expect(await repository.count({ questionnaireScope: 'assigned' })).toBe(3);
    expect((await repository.getById(3))?.about).toBeNull();
  });

  it('should roll back a bulk update when one row is invalid', async () => {
    const created = await seed();
    created[0]?.applyFields({ staffId: 4 });
    created[1]?.applyFields({ staffId: -1 });

    await expect(repository.bulkUpdate(created.slice(0, 2), ['staffId'], 1)).rejects.toBeInstanceOf(
      RepositoryOperationError
    );

    expect((await repository.getById(1))?.staffId).toBeNull();
  });

  it('should count and paginate through filters', async () => {
    await seed();

    expect(await repository.count()).toBe(3);
    expect(await repository.count({ questionnaireType: 'verification' })).toBe(2);

    const first = await repository.paginate(1, 1, { questionnaireType: 'verification' });
    expect(first.entities.map((questionnaire) => questionnaire.name)).toEqual(['kyc']);
    expect(first.totalCount).toBe(2);
    expect(first.totalPages).toBe(2);
    expect(first.hasNext).toBe(true);

    const second = await repository.paginate(2, 1, { questionnaireType: 'verification' });
    expect(second.entities.map((questionnaire) => questionnaire.name)).toEqual(['aml']);
    expect(second.hasNext).toBe(false);
    expect(second.hasPrevious).toBe(true);
  });

  it('should find by name and list by scope', async () => {
    await seed();

    expect((await repository.findByName('aml'))?.id).toBe(2);
    expect(await repository.findByName('missing')).toBeNull();
    expect(await repository.listBy({ questionnaireScope: 'public' })).toHaveLength(3);
  });

  it('should truncate the caller name in the failure log', async () => {
    vi.spyOn(repository.manager, 'filterBy').mockImplementation(() => {
      throw new Error('boom');
    });

    await expect(repository.findByName('n'.repeat(150))).rejects.toBeInstanceOf(
      RepositoryOperationError
    );

    const errors = lines.filter((line) => line.level === LEVEL.error);
    expect(errors).toHaveLength(1);
    expect(errors[0]?.msg).toBe('Failed to find Questionnaire by name: boom');
    expect(errors[0]?.name).toBe(`${'n'.repeat(100)}...[TRUNCATED]`);
  });
});
