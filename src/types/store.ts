/**
 * Store configuration and interface types
 */

import type { NewReservation, Partition, Reservation, TimeWindow } from './reservation.js';

export type StoreType = 'google' | 'memory';

/**
 * Base configuration for all store backends
 */
export interface BaseStoreConfig {
  /** Unique identifier for this store instance */
  id: string;
  type: StoreType;
  /** Display name */
  name: string;
}

/**
 * Google Calendar store configuration
 */
export interface GoogleStoreConfig extends BaseStoreConfig {
  type: 'google';
  /** OAuth client ID */
  clientId?: string;
  /** OAuth client secret */
  clientSecret?: string;
  /** OAuth redirect URI */
  redirectUri?: string;
  /** Pre-authorized credentials */
  credentials?: {
    accessToken?: string;
    refreshToken?: string;
    tokenExpiry?: string;
  };
  /** Calendar holding the recurring partition */
  recurringCalendarName: string;
  /** Calendar holding the transient partition */
  transientCalendarName: string;
}

/**
 * In-process store configuration
 */
export interface MemoryStoreConfig extends BaseStoreConfig {
  type: 'memory';
}

export type StoreConfig = GoogleStoreConfig | MemoryStoreConfig;

/**
 * Contract every store backend implements
 */
export interface IEventStore {
  // ─────────────────────────────────────────────────────────────────────────────
  // Identity
  // ─────────────────────────────────────────────────────────────────────────────
  readonly storeId: string;
  readonly storeType: StoreType;
  readonly displayName: string;

  // ─────────────────────────────────────────────────────────────────────────────
  // Connection Lifecycle
  // ─────────────────────────────────────────────────────────────────────────────
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  // ─────────────────────────────────────────────────────────────────────────────
  // Reservation Operations
  // ─────────────────────────────────────────────────────────────────────────────
  /** Write a reservation; STORE_UNAVAILABLE or INVARIANT_VIOLATION on failure */
  create(reservation: NewReservation): Promise<Reservation>;

  /** Read one reservation; searches both partitions when none is given */
  get(id: string, partition?: Partition): Promise<Reservation>;

  /** Delete one reservation; NOT_FOUND for an unknown id */
  delete(id: string, partition: Partition): Promise<void>;

  /** Materialized reservations overlapping the half-open window */
  listInRange(partition: Partition, window: TimeWindow): Promise<Reservation[]>;

  /** Bulk rollback of a sync; recurring partition only, idempotent */
  deleteByAudienceTag(tag: string): Promise<number>;

  /** Remove transient entries that ended at or before `before` */
  deletePastTransient(before: string): Promise<number>;
}
