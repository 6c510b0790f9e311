/**
 * Writer Types
 *
 * A writer is one device allowed to append delta segments to a budget.
 * Writers never talk to each other; they coordinate only through the
 * counters recorded in their metadata and segment filenames.
 */

/**
 * A writer's metadata record.
 */
export interface WriterRecord {
  /** Upper-case GUID; also the name of the writer's directory */
  readonly writerGuid: string;

  /** Short tag assigned at registration (A, B, …, Z, AA, …) */
  readonly writerTag: string;

  /** Highest counter this writer has incorporated */
  readonly knowledge: number;

  /** True once the writer has merged every segment of every writer it knows */
  readonly hasFullKnowledge: boolean;

  /** Human-readable device name, if one was given */
  readonly friendlyName?: string | undefined;
}

/**
 * Inclusive range of counters owned by one delta segment.
 */
export interface CounterRange {
  readonly start: number;
  readonly end: number;
}
