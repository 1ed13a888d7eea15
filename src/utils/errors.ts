export class RelayError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RelayError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends RelayError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class MaxError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('MAX', message, options);
    this.name = 'MaxError';
  }
}

export class TelegramError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('TELEGRAM', message, options);
    this.name = 'TelegramError';
  }
}

/** The source connection dropped, or could not be re-established within the reconnect bound. */
export class ConnectionLostError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONNECTION_LOST', options);
    this.name = 'ConnectionLostError';
  }
}

export class FetchFailedError extends RelayError {
  public readonly url: string;
  public readonly status: number | undefined;
  /** 4xx responses: retrying without different credentials will not help. */
  public readonly permanent: boolean;

  constructor(
    url: string,
    message: string,
    details: { status?: number; permanent: boolean },
    options?: ErrorOptions
  ) {
    super(message, 'FETCH_FAILED', options);
    this.name = 'FetchFailedError';
    this.url = url;
    this.status = details.status;
    this.permanent = details.permanent;
  }
}

export class DeliveryFailedError extends RelayError {
  public readonly recipientId: string;
  public readonly permanent: boolean;
  public readonly retryAfterMs: number | undefined;

  constructor(
    recipientId: string,
    message: string,
    details: { permanent: boolean; retryAfterMs?: number },
    options?: ErrorOptions
  ) {
    super(message, 'DELIVERY_FAILED', options);
    this.name = 'DeliveryFailedError';
    this.recipientId = recipientId;
    this.permanent = details.permanent;
    this.retryAfterMs = details.retryAfterMs;
  }
}

export class PersistenceFailedError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'PERSISTENCE_FAILED', options);
    this.name = 'PersistenceFailedError';
  }
}

export class ConfigError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
