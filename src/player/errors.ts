/**
 * Raised when the configured sequence cannot be played: no questions, or a
 * bundle without its video.
 */
export class ConfigurationError extends Error {
  readonly questionIndex: number | null;

  constructor(message: string, questionIndex: number | null = null) {
    super(message);
    this.name = 'ConfigurationError';
    this.questionIndex = questionIndex;
  }
}

