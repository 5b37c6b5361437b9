import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Firestore, CollectionReference, DocumentReference } from 'firebase-admin/firestore';
import {
  createMockQuerySnapshot,
  createFirestoreMocks,
  setupFirebaseMock,
} from '../test-utils/index.js';
import { parseTemplateStructure } from './program-template.repository.js';
import { createTemplateStructure } from '../__tests__/utils/index.js';

function templateData(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: 'Upper Lower Classic',
    goal: 'hypertrophy',
    experience_level: 'intermediate',
    duration_weeks: 8,
    structure: createTemplateStructure(),
    usage_count: 3,
    is_system: true,
    ...overrides,
  };
}

describe('ProgramTemplateRepository', () => {
  let mockDb: Partial<Firestore>;
  let mockCollection: Partial<CollectionReference>;
  let mockDocRef: Partial<DocumentReference>;
  let ProgramTemplateRepository: typeof import('./program-template.repository.js').ProgramTemplateRepository;
  let fieldValueIncrementMock: ReturnType<typeof vi.fn>;

  beforeEach(async () => {
    vi.resetModules();

    const mocks = createFirestoreMocks();
    mockDb = mocks.mockDb;
    mockCollection = mocks.mockCollection;
    mockDocRef = mocks.mockDocRef;

    setupFirebaseMock(mocks);

    fieldValueIncrementMock = vi.fn((amount: number) => ({ increment: amount }));
    vi.doMock('firebase-admin/firestore', () => ({
      FieldValue: {
        increment: fieldValueIncrementMock,
      },
    }));

    const module = await import('./program-template.repository.js');
    ProgramTemplateRepository = module.ProgramTemplateRepository;
  });

  describe('getByCriteria', () => {
    it('filters by duration window and sorts by usage', async () => {
      const repository = new ProgramTemplateRepository(mockDb as Firestore);
      (mockCollection.get as ReturnType<typeof vi.fn>).mockResolvedValue(
        createMockQuerySnapshot([
          { id: 'tpl-short', data: templateData({ duration_weeks: 4, usage_count: 50 }) },
          { id: 'tpl-low', data: templateData({ duration_weeks: 10, usage_count: 1 }) },
          { id: 'tpl-high', data: templateData({ duration_weeks: 6, usage_count: 9 }) },
        ])
      );

      const result = await repository.getByCriteria('hypertrophy', 'intermediate', 8);

      expect(mockDb.collection).toHaveBeenCalledWith('test_program_templates');
      expect(mockCollection.where).toHaveBeenCalledWith('goal', '==', 'hypertrophy');
      expect(mockCollection.where).toHaveBeenCalledWith('experience_level', '==', 'intermediate');
      expect(result.map((template) => template.id)).toEqual(['tpl-high', 'tpl-low']);
    });

    it('keeps every duration when none is given', async () => {
      const repository = new ProgramTemplateRepository(mockDb as Firestore);
      (mockCollection.get as ReturnType<typeof vi.fn>).mockResolvedValue(
        createMockQuerySnapshot([
          { id: 'tpl-short', data: templateData({ duration_weeks: 4 }) },
          { id: 'tpl-long', data: templateData({ duration_weeks: 16 }) },
        ])
      );

      const result = await repository.getByCriteria('hypertrophy', 'intermediate');

      expect(result).toHaveLength(2);
    });

    it('caches results per criteria', async () => {
      const repository = new ProgramTemplateRepository(mockDb as Firestore);
      (mockCollection.get as ReturnType<typeof vi.fn>).mockResolvedValue(
        createMockQuerySnapshot([{ id: 'tpl-1', data: templateData() }])
      );

      await repository.getByCriteria('hypertrophy', 'intermediate', 8);
      await repository.getByCriteria('hypertrophy', 'intermediate', 8);
      await repository.getByCriteria('hypertrophy', 'intermediate', 12);

      expect(mockCollection.get).toHaveBeenCalledTimes(2);
    });

    it('parses template documents', async () => {
      const repository = new ProgramTemplateRepository(mockDb as Firestore);
      (mockCollection.get as ReturnType<typeof vi.fn>).mockResolvedValue(
        createMockQuerySnapshot([
          { id: 'tpl-1', data: templateData() },
          { id: 'tpl-bad', data: templateData({ goal: 'powerlifting' }) },
        ])
      );

      const result = await repository.getByCriteria('hypertrophy', 'intermediate', 8);

      expect(result).toEqual([
        {
          id: 'tpl-1',
          name: 'Upper Lower Classic',
          goal: 'hypertrophy',
          experience_level: 'intermediate',
          duration_weeks: 8,
          structure: createTemplateStructure(),
          usage_count: 3,
          is_system: true,
        },
      ]);
    });
  });

  describe('incrementUsageCount', () => {
    it('increments the counter and clears cached lookups', async () => {
      const repository = new ProgramTemplateRepository(mockDb as Firestore);
      (mockCollection.get as ReturnType<typeof vi.fn>).mockResolvedValue(
        createMockQuerySnapshot([{ id: 'tpl-1', data: templateData() }])
      );

      await repository.getByCriteria('hypertrophy', 'intermediate', 8);
      await repository.incrementUsageCount('tpl-1');
      await repository.getByCriteria('hypertrophy', 'intermediate', 8);

      expect(mockCollection.doc).toHaveBeenCalledWith('tpl-1');
      expect(fieldValueIncrementMock).toHaveBeenCalledWith(1);
      expect(mockDocRef.update).toHaveBeenCalledWith({
        usage_count: { increment: 1 },
        updated_at: expect.any(String) as unknown as string,
      });
      expect(mockCollection.get).toHaveBeenCalledTimes(2);
    });
  });
});

describe('parseTemplateStructure', () => {
  it('defaults missing structure settings', () => {
    expect(
      parseTemplateStructure({
        weeks: [
          {
            week_pattern: 1,
            workouts: [
              {
                day_of_week: 3,
                name: 'Full Body',
                workout_type: 'full_body',
                muscle_groups: ['chest', 'quadriceps'],
                exercise_slots: 5,
              },
            ],
          },
        ],
      })
    ).toEqual({
      split_type: 'custom',
      mesocycle_length: 4,
      deload_frequency: 4,
      weeks: [
        {
          week_pattern: 1,
          workouts: [
            {
              day_of_week: 3,
              name: 'Full Body',
              workout_type: 'full_body',
              muscle_groups: ['chest', 'quadriceps'],
              exercise_slots: 5,
              target_duration_minutes: 60,
            },
          ],
        },
      ],
    });
  });

  it('drops malformed workouts and weeks', () => {
    const structure = parseTemplateStructure({
      weeks: [
        { week_pattern: 1, focus: 'Volume', workouts: [{ day_of_week: 9, name: 'Bad Day' }] },
        { workouts: [] },
      ],
    });

    expect(structure?.weeks).toEqual([{ week_pattern: 1, focus: 'Volume', workouts: [] }]);
  });

  it('rejects a structure without weeks', () => {
    expect(parseTemplateStructure({ split_type: 'ppl' })).toBeNull();
    expect(parseTemplateStructure('ppl')).toBeNull();
  });
});
