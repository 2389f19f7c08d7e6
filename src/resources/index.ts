/**
 * MCP Resources for the scheduler
 * Read-only views of today's schedule and the booking policy
 */

import type { IEventStore, Reservation } from '../types/index.js';
import { CANCELLATION_WINDOW_HOURS } from '../services/booking-service.js';
import {
  MAX_SUGGESTIONS,
  SEARCH_HORIZON_DAYS,
  SEARCH_WINDOWS,
  STEP_MINUTES,
} from '../services/slot-service.js';
import type { AppConfig } from '../utils/config.js';
import { now, toDateString, toWindow } from '../utils/datetime.js';

/**
 * Resource types available
 */
export interface ResourceDefinition {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

/**
 * Resource list
 */
export const resourceDefinitions: ResourceDefinition[] = [
  {
    uri: 'schedule://today',
    name: "Today's Schedule",
    description: 'Classes and one-off events scheduled for today',
    mimeType: 'application/json',
  },
  {
    uri: 'schedule://policy',
    name: 'Booking Policy',
    description: 'Operating hours, suggestion limits and the cancellation window',
    mimeType: 'application/json',
  },
];

/**
 * Resource handler type
 */
export type ResourceHandler = () => Promise<{ contents: Array<{ uri: string; mimeType: string; text: string }> }>;

function toEntry(reservation: Reservation) {
  return {
    id: reservation.id,
    summary: reservation.summary,
    start: reservation.window.start,
    end: reservation.window.end,
    partition: reservation.partition,
    audience: reservation.audienceTag,
    creator: reservation.creator,
  };
}

/**
 * Create resource handlers
 */
export function createResourceHandlers(
  store: IEventStore,
  config: Pick<AppConfig, 'defaults'>
): Record<string, ResourceHandler> {
  return {
    'schedule://today': async () => {
      const today = now();
      const window = toWindow(today.startOf('day'), today.plus({ days: 1 }).startOf('day'));

      const [recurring, transient] = await Promise.all([
        store.listInRange('recurring', window),
        store.listInRange('transient', window),
      ]);

      const response = {
        date: toDateString(today),
        utcOffset: config.defaults.utcOffset,
        classes: recurring.map(toEntry),
        events: transient.map(toEntry),
      };

      return {
        contents: [{
          uri: 'schedule://today',
          mimeType: 'application/json',
          text: JSON.stringify(response, null, 2),
        }],
      };
    },

    'schedule://policy': async () => {
      const policy = {
        utcOffset: config.defaults.utcOffset,
        timezone: config.defaults.timezone,
        searchWindows: SEARCH_WINDOWS.map(w => `${w.startHour}:00-${w.endHour}:00`),
        stepMinutes: STEP_MINUTES,
        horizonDays: SEARCH_HORIZON_DAYS,
        maxSuggestions: MAX_SUGGESTIONS,
        cancellationWindowHours: CANCELLATION_WINDOW_HOURS,
        transientEventsBlockEveryone: true,
      };

      return {
        contents: [{
          uri: 'schedule://policy',
          mimeType: 'application/json',
          text: JSON.stringify(policy, null, 2),
        }],
      };
    },
  };
}
