import { AppError } from './AppError';

/**
 * Store operations the engine performs.
 * String intersection keeps the union open for other adapters.
 */
export type StoreOperation =
  | 'getDb'
  | 'getCollection'
  | 'countDocuments'
  | 'find'
  | 'insertOne'
  | 'updateOne'
  | 'deleteOne'
  | 'nextSequence'
  | (string & {});

/**
 * Structured context attached to store failures.
 */
export interface StoreErrorContext {
  readonly operation: StoreOperation;
  /** Resource name as registered with the engine. */
  readonly resource?: string;
  readonly dbName?: string;
  readonly collection?: string;
  /**
   * Sanitized arguments preview. Never full documents.
   */
  readonly argsPreview?: Readonly<Record<string, unknown>>;
  /** Driver error code (e.g. MongoServerError.code). */
  readonly driverCode?: number | string;
}

/**
 * A failure reported by the underlying store, wrapped with the context of
 * the operation that triggered it. The original error is kept as `cause`.
 */
export class StoreActionError extends AppError {
  public readonly name = 'StoreActionError' as const;
  public readonly context: Readonly<StoreErrorContext>;

  constructor(message: string, context: StoreErrorContext, cause?: Error) {
    super(message, 'STORE_ACTION_FAILED', cause);
    this.context = Object.freeze({ ...context });
  }

  /** Human-readable summary for logs. */
  public summary(): string {
    const parts: string[] = [`op=${this.context.operation}`];
    if (this.context.resource) parts.push(`resource=${this.context.resource}`);
    if (this.context.dbName) parts.push(`db=${this.context.dbName}`);
    if (this.context.collection) parts.push(`coll=${this.context.collection}`);
    if (this.context.driverCode !== undefined) {
      parts.push(`driverCode=${String(this.context.driverCode)}`);
    }
    return `Store action failed: ${parts.join(' ')}`;
  }

  /**
   * Wrap a thrown value with consistent context.
   * A StoreActionError is returned as-is.
   */
  public static wrap(
    err: unknown,
    context: StoreErrorContext,
    fallbackMessage = 'Store action failed',
  ): StoreActionError {
    if (err instanceof StoreActionError) {
      return err;
    }
    const { message, driverCode } = extractDriverDetails(err);
    return new StoreActionError(
      message ?? fallbackMessage,
      { ...context, driverCode },
      err instanceof Error ? err : undefined,
    );
  }
}

function extractDriverDetails(err: unknown): {
  message?: string;
  driverCode?: number | string;
} {
  if (err && typeof err === 'object') {
    const message = Reflect.get(err, 'message');
    const code = Reflect.get(err, 'code');
    return {
      message:
        typeof message === 'string' && message.length > 0 ? message : undefined,
      driverCode:
        typeof code === 'number' || typeof code === 'string' ? code : undefined,
    };
  }
  return {};
}
