export class CronRelayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A raw trigger string with fewer than five `::` segments. */
export class FormatError extends CronRelayError {
  constructor(readonly raw: string, message = `expected channel::target::provider::cron::prompt, got '${raw}'`) {
    super(message);
  }
}

/** A cron expression that cron-parser (or the field count check) rejects. */
export class ScheduleError extends CronRelayError {
  constructor(readonly expression: string, reason: string, options?: { cause?: unknown }) {
    super(`invalid cron expression '${expression}': ${reason}`, options);
  }
}

export class ResolutionError extends CronRelayError {
  constructor(readonly providerName: string) {
    super(`provider '${providerName}' is not registered`);
  }
}

export class DeliveryError extends CronRelayError {}

export class ExecutionError extends CronRelayError {
  constructor(readonly triggerId: string, options: { cause: unknown }) {
    super(errorMessage(options.cause), options);
  }
}

export class LoopError extends CronRelayError {}

export class ConfigError extends CronRelayError {
  constructor(readonly path: string, readonly issues: string[]) {
    super(`invalid config at ${path}:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
