import { useMemo, useState } from 'react';
import type { ChangeEvent, FormEvent } from 'react';

import { DEFAULT_SESSION_MINUTES, NO_EQUIPMENT, type Exercise, type SessionConfig } from '../data/exercise';
import { getEquipmentTypes } from '../utils/exercise';
import { minutesToSeconds } from '../utils/sessionGenerator';

interface SessionSetupProps {
  exercises: Exercise[];
  voiceEnabled: boolean;
  onVoiceChange: (enabled: boolean) => void;
  onGenerate: (config: SessionConfig) => void;
}

export function SessionSetup({
  exercises,
  voiceEnabled,
  onVoiceChange,
  onGenerate,
}: SessionSetupProps) {
  const equipmentTypes = useMemo(() => getEquipmentTypes(exercises), [exercises]);
  const [minutes, setMinutes] = useState(String(DEFAULT_SESSION_MINUTES));
  const [selectedEquipment, setSelectedEquipment] = useState<string[]>([]);

  const toggleEquipment = (item: string) => (event: ChangeEvent<HTMLInputElement>) => {
    const { checked } = event.target;
    setSelectedEquipment((prev) =>
      checked ? [...prev, item] : prev.filter((value) => value !== item)
    );
  };

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    onGenerate({
      durationSeconds: minutesToSeconds(Number(minutes)),
      equipmentFilter: [NO_EQUIPMENT, ...selectedEquipment],
    });
  };

  return (
    <form className="session-setup" onSubmit={handleSubmit}>
      <label className="session-setup-field">
        Duration (minutes)
        <input
          type="number"
          min={1}
          step={1}
          value={minutes}
          onChange={(event) => setMinutes(event.target.value)}
        />
      </label>

      {equipmentTypes.length > 0 && (
        <fieldset className="session-setup-equipment">
          <legend>Available equipment</legend>
          {equipmentTypes.map((item) => (
            <label key={item}>
              <input
                type="checkbox"
                checked={selectedEquipment.includes(item)}
                onChange={toggleEquipment(item)}
              />
              {item}
            </label>
          ))}
        </fieldset>
      )}

      <label className="session-setup-field">
        <input
          type="checkbox"
          checked={voiceEnabled}
          onChange={(event) => onVoiceChange(event.target.checked)}
        />
        Announce exercises
      </label>

      <button className="btn btn-primary" type="submit">
        Generate session
      </button>
    </form>
  );
}
