import { getErrorMessage } from './errors';

export type SpeechOptions = {
  rate?: number;
  pitch?: number;
  volume?: number;
  lang?: string;
};

export const isSpeechAvailable = () =>
  typeof window !== 'undefined' &&
  'speechSynthesis' in window &&
  typeof window.SpeechSynthesisUtterance === 'function';

export const speak = (text: string, options: SpeechOptions = {}) => {
  if (!isSpeechAvailable()) {
    return false;
  }
  try {
    const utterance = new window.SpeechSynthesisUtterance(text);
    utterance.rate = options.rate ?? 1;
    utterance.pitch = options.pitch ?? 1;
    utterance.volume = options.volume ?? 1;
    utterance.lang = options.lang ?? 'en-US';
    window.speechSynthesis.speak(utterance);
    return true;
  } catch (err) {
    console.error('[Speech] Synthesis failed:', getErrorMessage(err));
    return false;
  }
};

export const cancelSpeech = () => {
  if (!isSpeechAvailable()) {
    return false;
  }
  window.speechSynthesis.cancel();
  return true;
};

const minutesText = (minutes: number) => (minutes === 1 ? 'one minute' : `${minutes} minutes`);
const secondsText = (seconds: number) => (seconds === 1 ? 'one second' : `${seconds} seconds`);

/** Spoken form of a duration: "10", "30 seconds", "one minute 5 seconds". */
export const formatTimeText = (totalSeconds: number) => {
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (totalSeconds <= 10) {
    return String(totalSeconds);
  }
  if (totalSeconds < 60) {
    return secondsText(totalSeconds);
  }
  if (seconds === 0) {
    return minutesText(minutes);
  }
  return `${minutesText(minutes)} ${secondsText(seconds)}`;
};

export const announceExercise = (name: string, durationSeconds: number) =>
  speak(`${name}, ${formatTimeText(durationSeconds)}`, { rate: 0.9, lang: 'en-GB' });
