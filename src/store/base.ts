/**
 * Abstract base class for event stores
 * All store backends must extend this class
 */

import type {
  IEventStore,
  NewReservation,
  Partition,
  Reservation,
  StoreConfig,
  StoreType,
  TimeWindow,
} from '../types/index.js';
import {
  ErrorCodes,
  SchedulerError,
  invariantViolationError,
  wrapError,
} from '../utils/error.js';
import { createLogger, type Logger } from '../utils/logger.js';

/**
 * Calendar ids a store must never write into
 */
const FORBIDDEN_TARGETS = new Set(['primary', 'default']);

/**
 * Abstract base class for all event stores
 */
export abstract class BaseEventStore implements IEventStore {
  protected _connected: boolean = false;
  protected logger: Logger;

  constructor(
    protected readonly config: StoreConfig,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger(`store:${config.type}`);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Identity (implemented by base class from config)
  // ─────────────────────────────────────────────────────────────────────────────

  get storeId(): string {
    return this.config.id;
  }

  get storeType(): StoreType {
    return this.config.type;
  }

  get displayName(): string {
    return this.config.name;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Connection Lifecycle
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Connect to the backing resource - must be implemented by subclasses
   */
  abstract connect(): Promise<void>;

  /**
   * Disconnect from the backing resource
   */
  async disconnect(): Promise<void> {
    this._connected = false;
    this.logger.info(`Disconnected from ${this.displayName}`);
  }

  isConnected(): boolean {
    return this._connected;
  }

  /**
   * Ensure connected before making calls
   */
  protected ensureConnected(): void {
    if (!this._connected) {
      throw new SchedulerError(
        `Store ${this.displayName} is not connected`,
        ErrorCodes.STORE_UNAVAILABLE,
        { retryable: true, details: { store: this.storeType, storeId: this.storeId } }
      );
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Reservation Operations - must be implemented by subclasses
  // ─────────────────────────────────────────────────────────────────────────────

  abstract create(reservation: NewReservation): Promise<Reservation>;
  abstract get(id: string, partition?: Partition): Promise<Reservation>;
  abstract delete(id: string, partition: Partition): Promise<void>;
  abstract listInRange(partition: Partition, window: TimeWindow): Promise<Reservation[]>;
  abstract deleteByAudienceTag(tag: string): Promise<number>;
  abstract deletePastTransient(before: string): Promise<number>;

  // ─────────────────────────────────────────────────────────────────────────────
  // Helper Methods
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Refuse writes into a default or unresolved target
   */
  protected assertWritableTarget(targetId: string | undefined, partition: Partition): string {
    if (!targetId || FORBIDDEN_TARGETS.has(targetId.toLowerCase())) {
      throw invariantViolationError(
        `Refusing to write ${partition} reservation into "${targetId ?? ''}"`,
        { store: this.storeId, partition, target: targetId }
      );
    }
    return targetId;
  }

  /**
   * Wrap errors with store context; typed errors pass through unchanged
   */
  protected wrapError(error: unknown, operation: string): SchedulerError {
    return wrapError(error, {
      operation: `${this.displayName} ${operation}`,
      fallbackCode: ErrorCodes.STORE_UNAVAILABLE,
    });
  }

  /**
   * Execute with error handling
   */
  protected async executeWithErrorHandling<T>(
    operation: string,
    fn: () => Promise<T>
  ): Promise<T> {
    this.ensureConnected();
    try {
      return await fn();
    } catch (error) {
      throw this.wrapError(error, operation);
    }
  }
}
