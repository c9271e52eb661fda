export function toUtcIsoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function toUtcIsoFileSafe(date: Date): string {
  return toUtcIsoSeconds(date).replace(/:/g, "-");
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/** Rounds up, so a stored time is never earlier than the instant it records. */
export function toEpochSecondsCeil(date: Date): number {
  return Math.ceil(date.getTime() / 1000);
}

export function fromEpochSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}
