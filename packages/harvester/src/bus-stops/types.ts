/**
 * Bus-stop registry entry as published in the static XML feed
 */
export interface BusStop {
  readonly name: string;
  /** Wheelchair-accessible boarding */
  readonly wab: boolean;
  readonly details: string;
  readonly latitude: number;
  readonly longitude: number;
}

export interface BusStopParseResult {
  readonly stops: readonly BusStop[];
  /** Entries dropped because their coordinates were not numeric */
  readonly skipped: number;
}
