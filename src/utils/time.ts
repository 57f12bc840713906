const pad2 = (value: number) => String(value).padStart(2, '0');

/** `MM:SS`, zero-padded; minutes keep counting past 59. */
export const formatDuration = (totalSeconds: number) => {
  const safeSeconds = Math.max(0, Math.floor(totalSeconds));
  const minutes = Math.floor(safeSeconds / 60);
  const seconds = safeSeconds % 60;
  return `${pad2(minutes)}:${pad2(seconds)}`;
};

export const formatMinutesLabel = (totalSeconds: number) => {
  const minutes = Math.round(totalSeconds / 60);
  return minutes === 1 ? '1 min' : `${minutes} min`;
};
