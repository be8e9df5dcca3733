// This module implements the ordered, notifying entity registry shared by tools, resources, and prompts.

import { CancellationToken } from './cancellation.js';
import { NOTIFICATION_KINDS, type NotificationKind, type NotificationQueue } from './notification-queue.js';
import { SchemaValidator } from './schema-validator.js';
import type { ArgumentMap, ArgumentSchema, DuplicatePolicy, EntityKind, InvocationContext } from '../types/domain.js';
import { CancellationError, DuplicateEntityError, InternalError, NotFoundError } from '../utils/errors.js';
import { errorForLog, getFallbackLogger, sanitizeForLog, type LogSink } from '../utils/logger.js';

const LIST_CHANGED_KIND: Record<EntityKind, NotificationKind> = {
  tool: NOTIFICATION_KINDS.toolsListChanged,
  resource: NOTIFICATION_KINDS.resourcesListChanged,
  prompt: NOTIFICATION_KINDS.promptsListChanged
};

export interface RegisteredEntity {
  name: string;
  description?: string;
  schema: ArgumentSchema;
}

export interface RegistryOptions {
  queue?: NotificationQueue | null;
  validator?: SchemaValidator;
  logger?: LogSink;
  duplicatePolicy?: DuplicatePolicy;
}

/**
 * Base registry keyed by entity name.
 *
 * Entries keep first-registration order: `Map` iteration follows insertion order and `set` on an existing key
 * keeps its slot, so an overwrite never moves a name. Every mutation enqueues one list-changed notification
 * when a queue is attached.
 */
export abstract class EntityRegistry<TEntity extends RegisteredEntity, TMetadata, TResult> {
  protected readonly entries = new Map<string, TEntity>();
  protected readonly validator: SchemaValidator;
  protected readonly logger: LogSink;
  protected readonly duplicatePolicy: DuplicatePolicy;
  private queue: NotificationQueue | null;

  protected constructor(
    public readonly kind: EntityKind,
    options: RegistryOptions = {}
  ) {
    this.queue = options.queue ?? null;
    this.validator = options.validator ?? new SchemaValidator();
    this.logger = options.logger ?? getFallbackLogger();
    this.duplicatePolicy = options.duplicatePolicy ?? 'overwrite';
  }

  public setNotificationQueue(queue: NotificationQueue | null): void {
    this.queue = queue;
  }

  public get(name: string): TEntity | null {
    return this.entries.get(name) ?? null;
  }

  public exists(name: string): boolean {
    return this.entries.has(name);
  }

  public count(): number {
    return this.entries.size;
  }

  public names(): string[] {
    return [...this.entries.keys()];
  }

  public list(): TMetadata[] {
    return [...this.entries.values()].flatMap((entity) => this.describe(entity));
  }

  public remove(name: string): boolean {
    if (!this.entries.delete(name)) {
      return false;
    }

    this.logger.info({ event: 'registry_entity_removed', kind: this.kind, name }, 'registry_entity_removed');
    this.notifyListChanged();
    return true;
  }

  public clear(): void {
    const removed = this.entries.size;
    this.entries.clear();

    this.logger.info({ event: 'registry_cleared', kind: this.kind, removed }, 'registry_cleared');
    this.notifyListChanged();
  }

  /**
   * Looks up, validates, then invokes. Validation failures never reach the handler; handler faults surface as
   * `InternalError` with the original error kept as `cause`.
   */
  public async execute(
    name: string,
    args: ArgumentMap = {},
    context?: Partial<InvocationContext>
  ): Promise<TResult> {
    const entity = this.require(name);
    this.logger.debug(
      { event: 'registry_execute', kind: this.kind, name, args: sanitizeForLog(args) },
      'registry_execute'
    );
    this.validator.validate(args, entity.schema);
    return this.guard(entity, this.createContext(context), (resolved) => this.invoke(entity, args, resolved));
  }

  // Returns nothing when the entity should not appear in `list()`.
  protected abstract describe(entity: TEntity): TMetadata[];

  protected abstract invoke(entity: TEntity, args: ArgumentMap, context: InvocationContext): Promise<TResult>;

  protected require(name: string): TEntity {
    const entity = this.entries.get(name);
    if (!entity) {
      throw new NotFoundError(this.kind, name);
    }
    return entity;
  }

  // Replacing an existing key keeps its position in the map.
  protected store(entity: TEntity): TEntity {
    const existing = this.entries.has(entity.name);

    if (existing && this.duplicatePolicy === 'reject') {
      throw new DuplicateEntityError(this.kind, entity.name);
    }

    this.entries.set(entity.name, entity);

    this.logger.info(
      {
        event: existing ? 'registry_entity_replaced' : 'registry_entity_registered',
        kind: this.kind,
        name: entity.name
      },
      existing ? 'registry_entity_replaced' : 'registry_entity_registered'
    );

    this.notifyListChanged();
    return entity;
  }

  protected createContext(context?: Partial<InvocationContext>): InvocationContext {
    return {
      token: context?.token ?? CancellationToken.none(),
      logger: context?.logger ?? this.logger,
      sessionId: context?.sessionId ?? null
    };
  }

  protected async guard<T>(
    entity: TEntity,
    context: InvocationContext,
    action: (context: InvocationContext) => Promise<T>
  ): Promise<T> {
    context.token.throwIfCancelled();

    try {
      return await action(context);
    } catch (error) {
      if (error instanceof CancellationError) {
        throw error;
      }

      this.logger.error(
        {
          event: 'registry_handler_failed',
          kind: this.kind,
          name: entity.name,
          error: errorForLog(error)
        },
        'registry_handler_failed'
      );

      if (error instanceof InternalError) {
        throw error;
      }

      throw new InternalError(`${this.kind} handler failed: ${entity.name}`, error);
    }
  }

  private notifyListChanged(): void {
    this.queue?.enqueue(LIST_CHANGED_KIND[this.kind]);
  }
}
