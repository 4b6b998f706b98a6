export class MapError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** No operator callsign could be resolved from the environment. */
export class ConfigError extends MapError {}

/** An activation list or tile request failed, timed out or returned an unusable body. */
export class FetchError extends MapError {
  public readonly url: string;
  public readonly status?: number;

  constructor(message: string, url: string, status?: number, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.url = url;
    this.status = status;
  }
}

/** There is nothing to draw: the activation list came back empty. */
export class EmptyDataError extends MapError {}
