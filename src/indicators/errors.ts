/**
 * Failures raised while evaluating an indicator. The indicator base class
 * catches both and records the message on the result.
 */

export class DataUnavailableError extends Error {
  constructor(
    message: string,
    public readonly timeframe: string | null = null
  ) {
    super(message);
    this.name = 'DataUnavailableError';
  }
}

export class IndicatorConfigError extends Error {
  constructor(
    message: string,
    public readonly side: string,
    public readonly indicator: string
  ) {
    super(message);
    this.name = 'IndicatorConfigError';
  }
}
