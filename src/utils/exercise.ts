import {
  MAX_DIFFICULTY,
  MIN_DIFFICULTY,
  NO_EQUIPMENT,
  type Exercise,
} from '../data/exercise';
import { InvalidExerciseDataError } from './errors';

export const isValidDifficulty = (value: unknown): value is number =>
  typeof value === 'number' &&
  Number.isFinite(value) &&
  value >= MIN_DIFFICULTY &&
  value <= MAX_DIFFICULTY;

export const isValidName = (value: unknown): value is string =>
  typeof value === 'string' && value.trim().length > 0;

const parseName = (value: unknown, label: string) => {
  if (!isValidName(value)) {
    throw new InvalidExerciseDataError(
      `${label}.name`,
      `${label}.name must be a non-empty string.`
    );
  }
  return value.trim();
};

const parseDifficulty = (value: unknown, label: string) => {
  if (!isValidDifficulty(value)) {
    throw new InvalidExerciseDataError(
      `${label}.difficulty`,
      `${label}.difficulty must be a number between ${MIN_DIFFICULTY} and ${MAX_DIFFICULTY}.`
    );
  }
  return value;
};

const parseEquipment = (value: unknown, label: string): string[] => {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new InvalidExerciseDataError(
      `${label}.equipment`,
      `${label}.equipment must be an array of strings.`
    );
  }
  const items = new Set<string>();
  value.forEach((item, index) => {
    if (typeof item !== 'string' || !item.trim()) {
      throw new InvalidExerciseDataError(
        `${label}.equipment`,
        `${label}.equipment[${index}] must be a non-empty string.`
      );
    }
    items.add(item.trim());
  });
  return [...items];
};

export const normalizeExercise = (raw: unknown, label = 'exercise'): Exercise => {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new InvalidExerciseDataError(label, `${label} must be an object.`);
  }
  const data = raw as Record<string, unknown>;
  const exercise: Exercise = {
    name: parseName(data.name, label),
    difficulty: parseDifficulty(data.difficulty, label),
    equipment: parseEquipment(data.equipment, label),
  };
  if (data.enabled !== undefined) {
    if (typeof data.enabled !== 'boolean') {
      throw new InvalidExerciseDataError(
        `${label}.enabled`,
        `${label}.enabled must be a boolean.`
      );
    }
    exercise.enabled = data.enabled;
  }
  return exercise;
};

export const validateLibrary = (exercises: readonly unknown[]): Exercise[] => {
  const seen = new Set<string>();
  return exercises.map((raw, index) => {
    const exercise = normalizeExercise(raw, `exercises[${index}]`);
    if (seen.has(exercise.name)) {
      throw new InvalidExerciseDataError(
        `exercises[${index}].name`,
        `Duplicate exercise name "${exercise.name}".`
      );
    }
    seen.add(exercise.name);
    return exercise;
  });
};

export const isExerciseEnabled = (exercise: Exercise) => exercise.enabled !== false;

export const getRequiredEquipment = (exercise: Exercise) =>
  exercise.equipment.filter((item) => item !== NO_EQUIPMENT);

/**
 * An exercise qualifies when everything it needs is in the filter. Exercises
 * with no equipment (or only "None") always qualify; an absent filter allows
 * every equipment type.
 */
export const matchesEquipmentFilter = (
  exercise: Exercise,
  equipmentFilter?: readonly string[]
) => {
  if (!equipmentFilter) {
    return true;
  }
  const allowed = new Set(equipmentFilter);
  return getRequiredEquipment(exercise).every((item) => allowed.has(item));
};

export const getEligibleExercises = (
  exercises: readonly Exercise[],
  equipmentFilter?: readonly string[]
) =>
  exercises.filter(
    (exercise) =>
      isExerciseEnabled(exercise) && matchesEquipmentFilter(exercise, equipmentFilter)
  );

export const getEquipmentTypes = (exercises: readonly Exercise[]) => {
  const types = new Set<string>();
  exercises.forEach((exercise) => {
    getRequiredEquipment(exercise).forEach((item) => types.add(item));
  });
  return [...types].sort((a, b) => a.localeCompare(b));
};

export const sortByName = (exercises: readonly Exercise[]) =>
  [...exercises].sort((a, b) => a.name.localeCompare(b.name));

export const clampDifficulty = (value: number) => {
  const rounded = Math.round(value * 10) / 10;
  return Math.min(MAX_DIFFICULTY, Math.max(MIN_DIFFICULTY, rounded));
};
