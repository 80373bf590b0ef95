export interface OutputWriter {
  /** A line of human-readable output on stdout. */
  line(text?: string): void;
  /** A single machine-readable document on stdout. */
  json(value: unknown): void;
  /** Diagnostics and progress, kept off stdout. */
  error(text: string): void;
}

export const consoleWriter: OutputWriter = {
  line: (text = '') => console.log(text),
  json: (value) => console.log(JSON.stringify(value)),
  error: (text) => console.error(text),
};
