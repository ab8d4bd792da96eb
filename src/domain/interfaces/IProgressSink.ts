/**
 * Progress Sink Interface
 * Layer: Domain
 *
 * Each phase reports through a sink handed to it by the caller instead of
 * writing to shared state. The CLI prints to the terminal; the HTTP run
 * service records the latest values on the run snapshot.
 */
export interface IProgressSink {
  /** Fraction complete for the current phase, 0 to 1. */
  progress(fraction: number): void;
  /** Free-text description of what the phase is doing now. */
  status(message: string): void;
  /** A recoverable problem: the phase stopped early or skipped an item. */
  warning(message: string): void;
}
