export type RenderConfigIssue = {
  code: string;
  message: string;
  path: readonly (string | number)[];
  severity: 'error' | 'warning';
};

/** Raised when a shape power outside the bulb's domain reaches the core. */
export class BulbDomainError extends Error {
  readonly power: number;

  constructor(power: number, message?: string) {
    super(message ?? `[bulb] power must be a finite value >= 2 (received ${power})`);
    this.name = 'BulbDomainError';
    this.power = power;
  }
}

export class RenderConfigValidationError extends Error {
  constructor(
    message: string,
    readonly issues: RenderConfigIssue[],
  ) {
    super(message);
    this.name = 'RenderConfigValidationError';
  }
}
