/**
 * Source of the current instant. Timer and Pomodoro logic read time only
 * through this, so tests can drive them with a manual clock.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};
