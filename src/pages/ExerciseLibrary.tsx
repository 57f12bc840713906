import { useCallback, useState } from 'react';
import type { FormEvent } from 'react';

import {
  DIFFICULTY_STEP,
  MAX_DIFFICULTY,
  MIN_DIFFICULTY,
  type Exercise,
} from '../data/exercise';
import type { useExerciseLibrary } from '../hooks/useExerciseLibrary';
import {
  buildExportFilename,
  detectConflicts,
  exportLibraryToJSON,
  parseLibraryJSON,
  type ConflictResolution,
  type ImportConflict,
} from '../utils/exerciseLibrary';
import { getErrorMessage } from '../utils/errors';

type LibraryControls = ReturnType<typeof useExerciseLibrary>;

interface ExerciseLibraryProps {
  library: LibraryControls;
  onBack: () => void;
  onSuccess: (message: string) => void;
  onError: (message: string) => void;
}

type PendingImport = {
  exercises: Exercise[];
  conflicts: ImportConflict[];
  resolutions: Record<string, ConflictResolution>;
};

const downloadJSON = (json: string, filename: string) => {
  const blob = new Blob([json], { type: 'application/json' });
  const url = URL.createObjectURL(blob);
  const anchor = document.createElement('a');
  anchor.href = url;
  anchor.download = filename;
  document.body.appendChild(anchor);
  anchor.click();
  document.body.removeChild(anchor);
  URL.revokeObjectURL(url);
};

export function ExerciseLibrary({ library, onBack, onSuccess, onError }: ExerciseLibraryProps) {
  const [name, setName] = useState('');
  const [difficulty, setDifficulty] = useState('1.0');
  const [equipment, setEquipment] = useState('');
  const [importText, setImportText] = useState('');
  const [pendingImport, setPendingImport] = useState<PendingImport | null>(null);

  const handleAdd = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    const result = library.add({
      name,
      difficulty: Number(difficulty),
      equipment: equipment
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean),
    });
    if (result.ok) {
      setName('');
      onSuccess(`Added ${name.trim()}`);
    } else {
      onError(result.error);
    }
  };

  const handleDifficulty = (exerciseName: string, value: number) => {
    const result = library.setDifficulty(exerciseName, value);
    if (!result.ok) {
      onError(result.error);
    }
  };

  const handleDelete = (exerciseName: string) => {
    if (!window.confirm(`Delete ${exerciseName}?`)) {
      return;
    }
    const result = library.remove(exerciseName);
    if (result.ok) {
      onSuccess(`Deleted ${exerciseName}`);
    } else {
      onError(result.error);
    }
  };

  const handleExport = useCallback(() => {
    try {
      downloadJSON(exportLibraryToJSON(library.exercises), buildExportFilename(new Date()));
      onSuccess('Library exported');
    } catch (err) {
      onError(`Failed to export library: ${getErrorMessage(err)}`);
    }
  }, [library.exercises, onSuccess, onError]);

  const handleParseImport = () => {
    try {
      const exercises = parseLibraryJSON(importText);
      const conflicts = detectConflicts(exercises, library.exercises);
      setPendingImport({ exercises, conflicts, resolutions: {} });
    } catch (err) {
      onError(getErrorMessage(err));
    }
  };

  const handleResolve = (conflictName: string, resolution: ConflictResolution) => {
    setPendingImport((prev) =>
      prev ? { ...prev, resolutions: { ...prev.resolutions, [conflictName]: resolution } } : prev
    );
  };

  const handleConfirmImport = () => {
    if (!pendingImport) {
      return;
    }
    const merged = library.importExercises(pendingImport.exercises, pendingImport.resolutions);
    setPendingImport(null);
    setImportText('');
    onSuccess(
      `Imported: ${merged.added.length} added, ${merged.updated.length} updated, ${merged.skipped.length} skipped`
    );
  };

  return (
    <div className="page library-page">
      <header className="page-header">
        <button className="back-button" onClick={onBack} type="button">
          ← Back
        </button>
        <h1>Exercise Library</h1>
      </header>

      {library.storageError && <p className="storage-warning">{library.storageError}</p>}

      <ul className="library-list">
        {library.exercises.map((exercise) => (
          <li
            key={exercise.name}
            className={`library-item${exercise.enabled === false ? ' library-item-disabled' : ''}`}
          >
            <span className="library-item-name">{exercise.name}</span>
            <span className="library-item-equipment">{exercise.equipment.join(', ') || 'None'}</span>
            <input
              aria-label={`${exercise.name} difficulty`}
              type="number"
              min={MIN_DIFFICULTY}
              max={MAX_DIFFICULTY}
              step={DIFFICULTY_STEP}
              value={exercise.difficulty}
              onChange={(event) => handleDifficulty(exercise.name, Number(event.target.value))}
            />
            <label>
              <input
                type="checkbox"
                checked={exercise.enabled !== false}
                onChange={() => library.toggleEnabled(exercise.name)}
              />
              Enabled
            </label>
            <button className="btn" type="button" onClick={() => handleDelete(exercise.name)}>
              Delete
            </button>
          </li>
        ))}
      </ul>

      <form className="library-add" onSubmit={handleAdd}>
        <h2>Add exercise</h2>
        <input
          aria-label="Exercise name"
          placeholder="Name"
          value={name}
          onChange={(event) => setName(event.target.value)}
        />
        <input
          aria-label="Exercise difficulty"
          type="number"
          min={MIN_DIFFICULTY}
          max={MAX_DIFFICULTY}
          step={DIFFICULTY_STEP}
          value={difficulty}
          onChange={(event) => setDifficulty(event.target.value)}
        />
        <input
          aria-label="Exercise equipment"
          placeholder="Equipment (comma separated)"
          value={equipment}
          onChange={(event) => setEquipment(event.target.value)}
        />
        <button className="btn btn-primary" type="submit">
          Add
        </button>
      </form>

      <section className="library-transfer">
        <h2>Import / export</h2>
        <button className="btn" type="button" onClick={handleExport}>
          Export JSON
        </button>
        <button className="btn" type="button" onClick={library.resetToDefaults}>
          Restore defaults
        </button>
        <textarea
          aria-label="Library JSON"
          placeholder='{"version": 1, "exercises": [...]}'
          value={importText}
          onChange={(event) => setImportText(event.target.value)}
        />
        <button className="btn" type="button" onClick={handleParseImport} disabled={!importText.trim()}>
          Check import
        </button>

        {pendingImport && (
          <div className="library-import-review">
            <p>{pendingImport.exercises.length} exercises ready to import.</p>
            {pendingImport.conflicts.map((conflict) => (
              <fieldset key={conflict.name}>
                <legend>{conflict.name}</legend>
                <label>
                  <input
                    type="radio"
                    name={`conflict-${conflict.name}`}
                    checked={pendingImport.resolutions[conflict.name] !== 'use-imported'}
                    onChange={() => handleResolve(conflict.name, 'keep-existing')}
                  />
                  Keep {conflict.existingDifficulty}
                </label>
                <label>
                  <input
                    type="radio"
                    name={`conflict-${conflict.name}`}
                    checked={pendingImport.resolutions[conflict.name] === 'use-imported'}
                    onChange={() => handleResolve(conflict.name, 'use-imported')}
                  />
                  Use {conflict.importedDifficulty}
                </label>
              </fieldset>
            ))}
            <button className="btn btn-primary" type="button" onClick={handleConfirmImport}>
              Import
            </button>
          </div>
        )}
      </section>
    </div>
  );
}
