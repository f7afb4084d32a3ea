export class HarvestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HarvestError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** No header line carrying `Number`, `Call#` and `Faculty` was found; the page is skipped. */
export class MalformedPageError extends HarvestError {
  constructor(public readonly pageId: string, message = `no listing header found in ${pageId}`) {
    super(message);
    this.name = "MalformedPageError";
  }
}

export class FetchError extends HarvestError {
  constructor(public readonly url: string, public readonly status: number) {
    super(`GET ${url} -> ${status}`);
    this.name = "FetchError";
  }
}

export class FetchTimeoutError extends HarvestError {
  constructor(public readonly url: string, public readonly timeoutMs: number) {
    super(`GET ${url} timed out after ${timeoutMs}ms`);
    this.name = "FetchTimeoutError";
  }
}

export class ConfigError extends HarvestError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
