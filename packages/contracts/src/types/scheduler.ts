/** Simulated time. Unrelated to wall-clock time. */
export type Tick = number;

/** Ticks until an entity is eligible again. */
export type Delay = number;
