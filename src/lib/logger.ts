// Library code logs through this so callers and tests can swap out console.
export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;
