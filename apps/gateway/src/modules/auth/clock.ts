// src/modules/auth/clock.ts

/** Time source injected into token issuance and validation. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Unix seconds (UTC), the unit of iat/nbf/exp. */
export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
