import { describe, it, expect, beforeEach } from 'vitest';
import { warn } from 'firebase-functions/logger';
import {
  ExerciseSelector,
  PlaceholderIdGenerator,
  createPlaceholderExercise,
  scoreCandidates,
} from './exercise-selector.service.js';
import {
  InMemoryExerciseLookup,
  createExercise,
  createMockExerciseLookup,
  loadExerciseCatalog,
  resetIdCounter,
} from '../__tests__/utils/index.js';

describe('PlaceholderIdGenerator', () => {
  it('slugifies names and never repeats an id', () => {
    const ids = new PlaceholderIdGenerator();

    expect(ids.next('Push Chest Exercise')).toBe('push-chest-exercise-1');
    expect(ids.next('Push Chest Exercise')).toBe('push-chest-exercise-2');
    expect(ids.next('  Calves!  ')).toBe('calves-3');
  });

  it('skips reserved ids', () => {
    const ids = new PlaceholderIdGenerator(new Set(['squat-exercise-1']));

    expect(ids.next('Squat Exercise')).toBe('squat-exercise-2');
  });
});

describe('createPlaceholderExercise', () => {
  it('names placeholders after pattern and first muscle', () => {
    const placeholder = createPlaceholderExercise(
      { movement_pattern: 'hinge', target_muscles: ['hamstrings', 'glutes'], supports_1rm: true },
      new PlaceholderIdGenerator()
    );

    expect(placeholder).toEqual({
      id: 'hinge-hamstrings-exercise-1',
      name: 'Hinge Hamstrings Exercise',
      category: 'compound',
      movement_pattern: 'hinge',
      primary_muscles: ['hamstrings', 'glutes'],
      secondary_muscles: [],
      equipment: [],
      supports_1rm: true,
      is_placeholder: true,
    });
  });

  it('title-cases snake_case muscles', () => {
    const placeholder = createPlaceholderExercise(
      { target_muscles: ['rear_deltoid'], category: 'isolation' },
      new PlaceholderIdGenerator()
    );

    expect(placeholder?.name).toBe('Rear Deltoid Exercise');
    expect(placeholder?.category).toBe('isolation');
    expect(placeholder?.movement_pattern).toBeNull();
  });

  it('returns null with nothing to name it after', () => {
    expect(createPlaceholderExercise({ category: 'compound' }, new PlaceholderIdGenerator())).toBeNull();
  });
});

describe('scoreCandidates', () => {
  beforeEach(() => {
    resetIdCounter();
  });

  it('weights muscle, category, pattern, equipment and 1RM support', () => {
    const full = createExercise({
      id: 'full',
      category: 'compound',
      movement_pattern: 'push',
      primary_muscles: ['chest'],
      equipment: ['barbell'],
      supports_1rm: true,
    });

    const [scored] = scoreCandidates([full], {
      movement_pattern: 'push',
      target_muscles: ['chest'],
      category: 'compound',
      supports_1rm: true,
      preferred_equipment: ['barbell'],
    });

    expect(scored?.score).toBeCloseTo(1.1, 5);
  });

  it('scores partial muscle overlap proportionally', () => {
    const isolation = createExercise({
      category: 'isolation',
      movement_pattern: 'isolation',
      primary_muscles: ['chest'],
    });

    const [scored] = scoreCandidates([isolation], { target_muscles: ['chest', 'triceps'] });

    expect(scored?.score).toBeCloseTo(0.2, 5);
  });

  it('sorts highest first and keeps input order on ties', () => {
    const a = createExercise({ id: 'a', category: 'isolation', primary_muscles: ['biceps'] });
    const b = createExercise({ id: 'b', category: 'isolation', primary_muscles: ['biceps'] });
    const c = createExercise({ id: 'c', category: 'compound', primary_muscles: ['biceps'] });

    const scored = scoreCandidates([a, b, c], { target_muscles: ['biceps'] });

    expect(scored.map((entry) => entry.exercise.id)).toEqual(['c', 'a', 'b']);
  });
});

describe('ExerciseSelector', () => {
  const catalog = loadExerciseCatalog();

  describe('fillExerciseSlot', () => {
    it('picks the best match the equipment supports', async () => {
      const selector = new ExerciseSelector(new InMemoryExerciseLookup(catalog));

      const exercise = await selector.fillExerciseSlot(
        { movement_pattern: 'squat', target_muscles: ['quadriceps', 'glutes'], supports_1rm: true },
        ['barbell', 'squat_rack']
      );

      expect(exercise?.id).toBe('back-squat');
    });

    it('skips excluded exercises', async () => {
      const selector = new ExerciseSelector(new InMemoryExerciseLookup(catalog));

      const exercise = await selector.fillExerciseSlot(
        { movement_pattern: 'squat', target_muscles: ['quadriceps'] },
        ['dumbbells'],
        new Set(['goblet-squat'])
      );

      expect(exercise?.id).toBe('bodyweight-squat');
    });

    it('falls back to a placeholder when nothing qualifies', async () => {
      const selector = new ExerciseSelector(new InMemoryExerciseLookup(catalog));

      const exercise = await selector.fillExerciseSlot(
        { movement_pattern: 'carry', target_muscles: ['forearms'] },
        ['dumbbells']
      );

      expect(exercise?.is_placeholder).toBe(true);
      expect(exercise?.name).toBe('Carry Forearms Exercise');
      expect(exercise?.id).toBe('carry-forearms-exercise-1');
    });

    it('treats a failing lookup as no candidates', async () => {
      const lookup = createMockExerciseLookup();
      lookup.search.mockRejectedValue(new Error('catalog offline'));
      const selector = new ExerciseSelector(lookup);

      const exercise = await selector.fillExerciseSlot({ target_muscles: ['chest'] }, []);

      expect(exercise?.is_placeholder).toBe(true);
      expect(warn).toHaveBeenCalledWith('program-generator:exercise_lookup_failed', {
        phase: 'fill_slot',
        error: 'catalog offline',
      });
    });

    it('passes normalized equipment and the candidate limit to the lookup', async () => {
      const lookup = new InMemoryExerciseLookup(catalog);
      const selector = new ExerciseSelector(lookup, { candidateLimit: 10 });

      await selector.fillExerciseSlot({ target_muscles: ['chest'] }, ['Dumbbell', 'flat_bench']);

      expect(lookup.searches[0]).toEqual({
        muscle_groups: ['chest'],
        equipment: ['dumbbells', 'bench'],
        movement_pattern: undefined,
        category: undefined,
        supports_1rm: undefined,
        limit: 10,
      });
    });

    it('filters equipment even when the lookup does not', async () => {
      const lookup = createMockExerciseLookup();
      lookup.search.mockResolvedValue([
        createExercise({ id: 'needs-rack', equipment: ['barbell', 'rack'] }),
        createExercise({ id: 'push-up', equipment: ['bodyweight'] }),
      ]);
      const selector = new ExerciseSelector(lookup);

      const exercise = await selector.fillExerciseSlot({ target_muscles: ['chest'] }, ['barbell']);

      expect(exercise?.id).toBe('push-up');
    });
  });

  describe('findBestMatch', () => {
    it('returns null instead of a placeholder', async () => {
      const selector = new ExerciseSelector(new InMemoryExerciseLookup(catalog));

      expect(await selector.findBestMatch({ target_muscles: ['neck'] }, ['barbell'])).toBeNull();
    });
  });

  describe('getAlternatives', () => {
    it('returns similar exercises the equipment supports', async () => {
      const selector = new ExerciseSelector(new InMemoryExerciseLookup(catalog));

      const alternatives = await selector.getAlternatives('back-squat', ['dumbbells'], 3);

      expect(alternatives.map((exercise) => exercise.id)).toEqual(['goblet-squat', 'bodyweight-squat']);
    });

    it('returns nothing for an unknown exercise', async () => {
      const selector = new ExerciseSelector(new InMemoryExerciseLookup(catalog));

      expect(await selector.getAlternatives('unknown', ['barbell'])).toEqual([]);
    });
  });
});
