import { useCallback, useMemo, useRef, useState } from 'react';

import type { Exercise } from '../data/exercise';
import {
  addExercise,
  createLibraryGateway,
  deleteExercise,
  getDefaultLibrary,
  loadLibraryFromStorage,
  mergeImportedExercises,
  saveLibraryToStorage,
  toggleExerciseEnabled,
  updateExerciseDifficulty,
  type ConflictResolution,
  type LibraryResult,
  type MergeResult,
  type StorageResult,
} from '../utils/exerciseLibrary';

export const useExerciseLibrary = () => {
  const [exercises, setExercises] = useState<Exercise[]>(() => loadLibraryFromStorage());
  const [storageError, setStorageError] = useState<string | null>(null);
  const exercisesRef = useRef(exercises);
  exercisesRef.current = exercises;

  const commit = useCallback((next: Exercise[]): StorageResult => {
    exercisesRef.current = next;
    setExercises(next);
    const saved = saveLibraryToStorage(next);
    setStorageError(saved.ok ? null : saved.error);
    return saved;
  }, []);

  const apply = useCallback(
    (result: LibraryResult<Exercise[]>): LibraryResult<Exercise[]> => {
      if (result.ok) {
        commit(result.value);
      }
      return result;
    },
    [commit]
  );

  const add = useCallback(
    (exercise: unknown) => apply(addExercise(exercisesRef.current, exercise)),
    [apply]
  );

  const setDifficulty = useCallback(
    (name: string, difficulty: number) =>
      apply(updateExerciseDifficulty(exercisesRef.current, name, difficulty)),
    [apply]
  );

  const toggleEnabled = useCallback(
    (name: string) => apply(toggleExerciseEnabled(exercisesRef.current, name)),
    [apply]
  );

  const remove = useCallback(
    (name: string) => apply(deleteExercise(exercisesRef.current, name)),
    [apply]
  );

  const importExercises = useCallback(
    (
      imported: readonly Exercise[],
      resolutions: Readonly<Record<string, ConflictResolution>> = {}
    ): MergeResult => {
      const merged = mergeImportedExercises(imported, exercisesRef.current, resolutions);
      commit(merged.library);
      return merged;
    },
    [commit]
  );

  const resetToDefaults = useCallback(() => commit(getDefaultLibrary()), [commit]);

  const gateway = useMemo(
    () =>
      createLibraryGateway(
        () => exercisesRef.current,
        (next) => {
          commit(next);
        }
      ),
    [commit]
  );

  return {
    exercises,
    storageError,
    gateway,
    add,
    setDifficulty,
    toggleEnabled,
    remove,
    importExercises,
    resetToDefaults,
  };
};
