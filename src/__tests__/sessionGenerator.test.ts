import {
  MAX_EXERCISE_SECONDS,
  MIN_EXERCISE_SECONDS,
  defaultExercises,
  type Exercise,
  type SessionPlan,
} from '../data/exercise';
import {
  EmptyLibraryError,
  InvalidConfigurationError,
  InvalidExerciseDataError,
} from '../utils/errors';
import {
  arrangeProgressively,
  generateSession,
  minutesToSeconds,
  reconcileDurations,
  selectRoundRobin,
} from '../utils/sessionGenerator';

const exercise = (name: string, difficulty: number, equipment: string[] = []): Exercise => ({
  name,
  difficulty,
  equipment,
});

const names = (plan: SessionPlan) => plan.entries.map((entry) => entry.exercise.name);
const durations = (plan: SessionPlan) => plan.entries.map((entry) => entry.durationSeconds);

describe('generateSession', () => {
  describe('validation', () => {
    it.each([0, -30, 12.5, Number.NaN])('rejects a duration of %s', (durationSeconds) => {
      expect(() => generateSession({ durationSeconds }, defaultExercises)).toThrow(
        InvalidConfigurationError
      );
    });

    it('rejects a library where nothing matches the equipment filter', () => {
      const library = [exercise('Wall Sit', 1.4, ['Wall'])];
      expect(() =>
        generateSession({ durationSeconds: 300, equipmentFilter: ['None'] }, library)
      ).toThrow(EmptyLibraryError);
    });

    it('rejects an empty library', () => {
      expect(() => generateSession({ durationSeconds: 300 }, [])).toThrow(EmptyLibraryError);
    });

    it('rejects malformed exercise records before generating', () => {
      expect(() =>
        generateSession({ durationSeconds: 300 }, [exercise('Squats', 2.5)])
      ).toThrow(InvalidExerciseDataError);
      expect(() => generateSession({ durationSeconds: 300 }, [exercise('  ', 1)])).toThrow(
        InvalidExerciseDataError
      );
      expect(() =>
        generateSession({ durationSeconds: 300 }, [exercise('Squats', 1), exercise('Squats', 1.2)])
      ).toThrow(InvalidExerciseDataError);
    });

    it('rejects short sessions when the policy says so', () => {
      expect(() =>
        generateSession(
          { durationSeconds: 10, shortSessionPolicy: 'reject' },
          [exercise('Squats', 1)]
        )
      ).toThrow(InvalidConfigurationError);
    });
  });

  it('builds the default five minute session from every eligible exercise', () => {
    const plan = generateSession(
      { durationSeconds: 300, equipmentFilter: ['None'] },
      defaultExercises
    );

    expect(plan.totalDurationSeconds).toBe(300);
    expect(names(plan)).toEqual([
      'Jumping Jacks',
      'Lunges',
      'Sit-ups',
      'Squats',
      'Push-ups',
      'Mountain Climbers',
      'Plank',
      'Burpees',
      'High Knees',
    ]);
    expect(durations(plan)).toEqual([23, 29, 29, 29, 34, 37, 42, 51, 26]);
    expect(names(plan)).not.toContain('Wall Sit');
  });

  it('gives a single exercise the whole short session', () => {
    const plan = generateSession({ durationSeconds: 50 }, [exercise('Squats', 1.0)]);
    expect(plan.entries).toHaveLength(1);
    expect(plan.entries[0].durationSeconds).toBe(50);
    expect(plan.totalDurationSeconds).toBe(50);
  });

  it('repeats the lone exercise when only one is eligible', () => {
    const plan = generateSession({ durationSeconds: 300 }, [exercise('Squats', 1.0)]);
    expect(names(plan)).toEqual(['Squats', 'Squats', 'Squats']);
    expect(durations(plan)).toEqual([100, 100, 100]);
  });

  it('cycles through every exercise and keeps the easiest ones at the edges', () => {
    const library = [exercise('A', 0.5), exercise('B', 1.0), exercise('C', 2.0)];
    const plan = generateSession({ durationSeconds: 1800 }, library);

    expect(plan.entries).toHaveLength(27);
    expect(names(plan).slice(0, 6)).toEqual(['A', 'C', 'B', 'A', 'C', 'B']);
    expect(plan.entries[0].durationSeconds).toBe(29);
    expect(plan.entries[1].durationSeconds).toBe(114);
    expect(plan.entries[2].durationSeconds).toBe(57);
    expect(plan.entries[26].exercise.name).toBe('B');
    expect(plan.totalDurationSeconds).toBe(1800);
  });

  it('spreads an allocation above the maximum over more occurrences', () => {
    const library = [exercise('A', 1.0), exercise('B', 2.0)];
    const plan = generateSession(
      { durationSeconds: 600, secondsPerDifficulty: 300 },
      library
    );

    expect(names(plan)).toEqual(['A', 'B', 'A', 'B', 'A', 'B', 'A']);
    expect(durations(plan)).toEqual([60, 120, 60, 120, 60, 120, 60]);
  });

  it('raises short allocations to the minimum and takes the difference elsewhere', () => {
    const plan = generateSession({ durationSeconds: 45 }, [
      exercise('A', 0.5),
      exercise('B', 2.0),
    ]);
    expect(names(plan)).toEqual(['A', 'B']);
    expect(durations(plan)).toEqual([20, 25]);
  });

  it('does not select more exercises than the minimum duration allows', () => {
    const plan = generateSession({ durationSeconds: 35 }, [
      exercise('A', 0.5),
      exercise('B', 1.0),
    ]);
    expect(names(plan)).toEqual(['A']);
    expect(durations(plan)).toEqual([35]);
  });

  it('extends a session shorter than one minimum entry', () => {
    const plan = generateSession({ durationSeconds: 10 }, [exercise('Squats', 1.0)]);
    expect(durations(plan)).toEqual([MIN_EXERCISE_SECONDS]);
    expect(plan.totalDurationSeconds).toBe(MIN_EXERCISE_SECONDS);
  });

  it('filters by equipment and skips disabled exercises', () => {
    const library = [
      exercise('Kettlebell Swing', 1.5, ['Kettlebell']),
      exercise('Plank', 1.5, ['None']),
      { ...exercise('Squats', 1.0), enabled: false },
      exercise('Wall Sit', 1.4, ['Wall']),
    ];

    const noEquipment = generateSession({ durationSeconds: 60, equipmentFilter: ['None'] }, library);
    expect(names(noEquipment)).toEqual(['Plank']);

    const withKettlebell = generateSession(
      { durationSeconds: 300, equipmentFilter: ['Kettlebell'] },
      library
    );
    expect(new Set(names(withKettlebell))).toEqual(new Set(['Kettlebell Swing', 'Plank']));

    const everything = generateSession({ durationSeconds: 300 }, library);
    expect(names(everything)).toContain('Wall Sit');
    expect(names(everything)).not.toContain('Squats');
  });

  it('returns the same plan for the same input', () => {
    const config = { durationSeconds: 900 };
    expect(generateSession(config, defaultExercises)).toEqual(
      generateSession(config, defaultExercises)
    );
  });

  it('copies exercises so the plan does not share records with the library', () => {
    const library = [exercise('Squats', 1.0, ['None'])];
    const plan = generateSession({ durationSeconds: 60 }, library);
    library[0].equipment.push('Bench');
    expect(plan.entries[0].exercise.equipment).toEqual(['None']);
  });

  describe.each([120, 300, 600, 900, 1200, 1800, 2700])('invariants at %i seconds', (total) => {
    const plan = generateSession({ durationSeconds: total }, defaultExercises);
    const cycle = defaultExercises.length;

    it('conserves the requested time', () => {
      expect(plan.totalDurationSeconds).toBe(total);
      expect(durations(plan).reduce((sum, value) => sum + value, 0)).toBe(total);
    });

    it('keeps every entry within bounds', () => {
      plan.entries.forEach((entry) => {
        expect(entry.durationSeconds).toBeGreaterThanOrEqual(MIN_EXERCISE_SECONDS);
        expect(entry.durationSeconds).toBeLessThanOrEqual(MAX_EXERCISE_SECONDS);
      });
    });

    it('never places the same exercise twice in a row', () => {
      const sequence = names(plan);
      sequence.slice(1).forEach((name, index) => {
        expect(name).not.toBe(sequence[index]);
      });
    });

    it('uses every exercise before repeating one', () => {
      const sequence = names(plan);
      const firstPass = sequence.slice(0, cycle);
      expect(new Set(firstPass).size).toBe(firstPass.length);
      sequence.slice(cycle).forEach((name, index) => {
        expect(name).toBe(sequence[index]);
      });
    });

    it('opens and closes easier than the hardest interior entry', () => {
      if (plan.entries.length < 3) {
        return;
      }
      const difficulties = plan.entries.map((entry) => entry.exercise.difficulty);
      const interiorMax = Math.max(...difficulties.slice(1, -1));
      expect(difficulties[0]).toBeLessThan(interiorMax);
      expect(difficulties[difficulties.length - 1]).toBeLessThan(interiorMax);
    });
  });
});

describe('selectRoundRobin', () => {
  it('selects each exercise once without a pacing', () => {
    const sorted = [exercise('A', 0.5), exercise('B', 1.0), exercise('C', 2.0)];
    expect(selectRoundRobin(sorted, 300)).toEqual([0, 1, 2]);
  });

  it('stops the first pass when the minimum duration runs out', () => {
    const sorted = [exercise('A', 0.5), exercise('B', 1.0), exercise('C', 2.0)];
    expect(selectRoundRobin(sorted, 50)).toEqual([0, 1]);
  });

  it('walks the list again until the pacing fills the session', () => {
    const sorted = [exercise('A', 1.0), exercise('B', 1.0)];
    expect(selectRoundRobin(sorted, 200, 60)).toEqual([0, 1, 0, 1]);
  });

  it('always selects at least one exercise', () => {
    expect(selectRoundRobin([exercise('A', 2.0)], 5, 60)).toEqual([0]);
  });
});

describe('reconcileDurations', () => {
  it('adds missing seconds easiest first, wrapping around', () => {
    expect(reconcileDurations([20, 60], [1, 2], 70)).toEqual([25, 65]);
  });

  it('removes extra seconds without going below the minimum', () => {
    expect(reconcileDurations([20, 30], [0.5, 1], 45)).toEqual([20, 25]);
  });

  it('stops when every entry is at a bound', () => {
    expect(reconcileDurations([120, 120], [1, 1], 250)).toEqual([120, 120]);
  });
});

describe('arrangeProgressively', () => {
  it('moves the second easiest exercise to the end of a single pass', () => {
    expect(arrangeProgressively([0, 1, 2, 3, 4], 5)).toEqual([0, 2, 3, 4, 1]);
  });

  it('applies the same order to every pass so the cycle holds', () => {
    const selection = [0, 1, 2, 3, 0, 1, 2];
    const order = arrangeProgressively(selection, 4);
    expect(order).toEqual([0, 2, 1, 3, 4, 6, 5]);
    expect(order.map((position) => selection[position])).toEqual([0, 2, 1, 3, 0, 2, 1]);
  });

  it('leaves short plans alone', () => {
    expect(arrangeProgressively([0, 1], 2)).toEqual([0, 1]);
  });
});

describe('minutesToSeconds', () => {
  it('converts minutes to whole seconds', () => {
    expect(minutesToSeconds(5)).toBe(300);
    expect(minutesToSeconds(2.5)).toBe(150);
  });
});
