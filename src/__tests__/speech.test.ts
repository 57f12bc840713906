import { announceExercise, cancelSpeech, formatTimeText, speak } from '../utils/speech';

class FakeUtterance {
  text: string;
  rate = 1;
  pitch = 1;
  volume = 1;
  lang = '';

  constructor(text: string) {
    this.text = text;
  }
}

describe('formatTimeText', () => {
  it.each([
    [5, '5'],
    [10, '10'],
    [30, '30 seconds'],
    [60, 'one minute'],
    [120, '2 minutes'],
    [65, 'one minute 5 seconds'],
    [121, '2 minutes one second'],
  ])('reads %i seconds as "%s"', (seconds, expected) => {
    expect(formatTimeText(seconds)).toBe(expected);
  });
});

describe('speech synthesis', () => {
  it('does nothing when the browser cannot speak', () => {
    expect(speak('Squats')).toBe(false);
    expect(cancelSpeech()).toBe(false);
  });

  describe('with a synthesis engine', () => {
    const engine = { speak: vi.fn(), cancel: vi.fn() };

    beforeEach(() => {
      Object.defineProperty(window, 'speechSynthesis', { value: engine, configurable: true });
      Object.defineProperty(window, 'SpeechSynthesisUtterance', {
        value: FakeUtterance,
        configurable: true,
      });
    });

    afterEach(() => {
      Reflect.deleteProperty(window, 'speechSynthesis');
      Reflect.deleteProperty(window, 'SpeechSynthesisUtterance');
      engine.speak.mockReset();
      engine.cancel.mockReset();
    });

    it('announces an exercise with its duration', () => {
      expect(announceExercise('Plank', 45)).toBe(true);

      expect(engine.speak).toHaveBeenCalledTimes(1);
      expect(engine.speak.mock.calls[0][0]).toMatchObject({
        text: 'Plank, 45 seconds',
        rate: 0.9,
        lang: 'en-GB',
      });
    });

    it('cancels queued speech', () => {
      expect(cancelSpeech()).toBe(true);
      expect(engine.cancel).toHaveBeenCalledTimes(1);
    });

    it('reports a failing engine', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      engine.speak.mockImplementation(() => {
        throw new Error('busy');
      });

      expect(speak('Squats')).toBe(false);
      expect(error).toHaveBeenCalledWith('[Speech] Synthesis failed:', 'busy');
      error.mockRestore();
    });
  });
});
