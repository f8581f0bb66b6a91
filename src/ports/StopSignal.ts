/** Process-level stop sentinel checked once per cycle. */
export interface StopSignal {
  isRaised(): boolean;
  clear(): void;
}
