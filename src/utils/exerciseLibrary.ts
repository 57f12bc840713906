import { defaultExercises, type Exercise } from '../data/exercise';
import { getErrorMessage } from './errors';
import {
  clampDifficulty,
  isValidDifficulty,
  isValidName,
  normalizeExercise,
  sortByName,
  validateLibrary,
} from './exercise';
import type { LibraryGateway } from './sessionController';

export const LIBRARY_STORAGE_KEY = 'circuitTimer.library.v1';
export const LIBRARY_FORMAT_VERSION = 1;

export type StorageResult = { ok: true } | { ok: false; error: string };

export type LibraryResult<T> = { ok: true; value: T } | { ok: false; error: string };

export type PersistedLibrary = {
  version: number;
  exercises: Exercise[];
};

export type ImportConflict = {
  name: string;
  existingDifficulty: number;
  importedDifficulty: number;
};

export type ConflictResolution = 'keep-existing' | 'use-imported';

export type MergeResult = {
  added: string[];
  skipped: string[];
  updated: string[];
  library: Exercise[];
};

const cloneExercises = (exercises: readonly Exercise[]) =>
  exercises.map((exercise) => ({ ...exercise, equipment: [...exercise.equipment] }));

export const getDefaultLibrary = () => sortByName(cloneExercises(defaultExercises));

const toPersisted = (exercises: readonly Exercise[]): PersistedLibrary => ({
  version: LIBRARY_FORMAT_VERSION,
  exercises: cloneExercises(exercises),
});

const getStorage = (): Storage | null => {
  if (typeof window === 'undefined') {
    return null;
  }
  try {
    return window.localStorage;
  } catch (err) {
    console.warn('[Library] localStorage is not available:', getErrorMessage(err));
    return null;
  }
};

/**
 * Reads the stored library, sorted by name. Missing, empty or unreadable data
 * falls back to the default exercises.
 */
export const loadLibraryFromStorage = (): Exercise[] => {
  const storage = getStorage();
  if (!storage) {
    return getDefaultLibrary();
  }
  try {
    const raw = storage.getItem(LIBRARY_STORAGE_KEY);
    if (!raw) {
      return getDefaultLibrary();
    }
    const exercises = parseLibraryJSON(raw);
    return sortByName(exercises);
  } catch (err) {
    console.warn('[Library] Ignoring stored library:', getErrorMessage(err));
    return getDefaultLibrary();
  }
};

export const saveLibraryToStorage = (exercises: readonly Exercise[]): StorageResult => {
  const storage = getStorage();
  if (!storage) {
    return { ok: false, error: 'Local storage is not available.' };
  }
  try {
    storage.setItem(LIBRARY_STORAGE_KEY, JSON.stringify(toPersisted(exercises)));
    return { ok: true };
  } catch (err) {
    const error = `Failed to write library: ${getErrorMessage(err)}`;
    console.warn('[Library]', error);
    return { ok: false, error };
  }
};

export const clearLibraryStorage = (): StorageResult => {
  const storage = getStorage();
  if (!storage) {
    return { ok: false, error: 'Local storage is not available.' };
  }
  try {
    storage.removeItem(LIBRARY_STORAGE_KEY);
    return { ok: true };
  } catch (err) {
    return { ok: false, error: `Failed to clear library: ${getErrorMessage(err)}` };
  }
};

const findExercise = (exercises: readonly Exercise[], name: string) =>
  exercises.find((exercise) => exercise.name === name.trim());

export const addExercise = (
  exercises: readonly Exercise[],
  raw: unknown
): LibraryResult<Exercise[]> => {
  let exercise: Exercise;
  try {
    exercise = normalizeExercise(raw);
  } catch (err) {
    return { ok: false, error: getErrorMessage(err) };
  }
  if (findExercise(exercises, exercise.name)) {
    return { ok: false, error: `Exercise "${exercise.name}" already exists.` };
  }
  return { ok: true, value: sortByName([...exercises, exercise]) };
};

const updateByName = (
  exercises: readonly Exercise[],
  name: string,
  update: (exercise: Exercise) => Exercise
): LibraryResult<Exercise[]> => {
  if (!isValidName(name) || !findExercise(exercises, name)) {
    return { ok: false, error: `Exercise "${name}" not found.` };
  }
  const trimmed = name.trim();
  return {
    ok: true,
    value: exercises.map((exercise) =>
      exercise.name === trimmed ? update(exercise) : exercise
    ),
  };
};

export const updateExerciseDifficulty = (
  exercises: readonly Exercise[],
  name: string,
  difficulty: number
): LibraryResult<Exercise[]> => {
  if (!isValidDifficulty(difficulty)) {
    return { ok: false, error: 'Difficulty must be between 0.5 and 2.0.' };
  }
  return updateByName(exercises, name, (exercise) => ({ ...exercise, difficulty }));
};

export const toggleExerciseEnabled = (
  exercises: readonly Exercise[],
  name: string
): LibraryResult<Exercise[]> =>
  updateByName(exercises, name, (exercise) => ({
    ...exercise,
    enabled: exercise.enabled === false,
  }));

export const deleteExercise = (
  exercises: readonly Exercise[],
  name: string
): LibraryResult<Exercise[]> => {
  if (!findExercise(exercises, name)) {
    return { ok: false, error: `Exercise "${name}" not found.` };
  }
  const trimmed = name.trim();
  return { ok: true, value: exercises.filter((exercise) => exercise.name !== trimmed) };
};

export const exportLibraryToJSON = (exercises: readonly Exercise[]) =>
  JSON.stringify(toPersisted(exercises), null, 2);

const pad2 = (value: number) => String(value).padStart(2, '0');

export const buildExportFilename = (date: Date) => {
  const stamp = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(
    date.getDate()
  )}-${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `exercise-library-${stamp}.json`;
};

/** Parses a persisted or exported library document; throws on any invalid record. */
export const parseLibraryJSON = (json: string): Exercise[] => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new Error(`Failed to parse JSON: ${getErrorMessage(err)}`);
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('Library JSON must be an object.');
  }
  const data = parsed as Record<string, unknown>;
  if (data.version !== undefined && data.version !== LIBRARY_FORMAT_VERSION) {
    throw new Error(`Unsupported library version: ${String(data.version)}.`);
  }
  if (!Array.isArray(data.exercises)) {
    throw new Error('Library JSON must include an exercises array.');
  }
  if (data.exercises.length === 0) {
    throw new Error('Library JSON contains no exercises.');
  }
  return validateLibrary(data.exercises);
};

export const detectConflicts = (
  imported: readonly Exercise[],
  existing: readonly Exercise[]
): ImportConflict[] => {
  const existingByName = new Map(existing.map((exercise) => [exercise.name, exercise]));
  return imported.flatMap((exercise) => {
    const current = existingByName.get(exercise.name);
    if (!current || current.difficulty === exercise.difficulty) {
      return [];
    }
    return [
      {
        name: exercise.name,
        existingDifficulty: current.difficulty,
        importedDifficulty: exercise.difficulty,
      },
    ];
  });
};

export const mergeImportedExercises = (
  imported: readonly Exercise[],
  existing: readonly Exercise[],
  resolutions: Readonly<Record<string, ConflictResolution>> = {}
): MergeResult => {
  const existingByName = new Map(existing.map((exercise) => [exercise.name, exercise]));
  const added: string[] = [];
  const skipped: string[] = [];
  const updated: string[] = [];

  imported.forEach((exercise) => {
    const current = existingByName.get(exercise.name);
    if (!current) {
      added.push(exercise.name);
    } else if (current.difficulty === exercise.difficulty) {
      skipped.push(exercise.name);
    } else if (resolutions[exercise.name] === 'use-imported') {
      updated.push(exercise.name);
    } else {
      skipped.push(exercise.name);
    }
  });

  const replaced = new Set([...added, ...updated]);
  const library = sortByName([
    ...existing.filter((exercise) => !replaced.has(exercise.name)),
    ...cloneExercises(imported.filter((exercise) => replaced.has(exercise.name))),
  ]);

  return { added, skipped, updated, library };
};

/**
 * Adapts a library held elsewhere (React state, a test array) to the
 * controller. Difficulty writes go through `onChange`; persisting is up to
 * the caller and is not awaited.
 */
export const createLibraryGateway = (
  getExercises: () => readonly Exercise[],
  onChange: (exercises: Exercise[]) => void
): LibraryGateway => ({
  getExercises,
  updateDifficulty: (name, difficulty) => {
    const result = updateExerciseDifficulty(getExercises(), name, clampDifficulty(difficulty));
    if (result.ok) {
      onChange(result.value);
    } else {
      console.warn('[Library]', result.error);
    }
  },
});
