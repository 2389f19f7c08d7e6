/**
 * Google Calendar OAuth authentication handling
 */

import { google } from 'googleapis';
import type { OAuth2Client, Credentials } from 'google-auth-library';
import type { GoogleStoreConfig } from '../../types/index.js';
import { ErrorCodes, SchedulerError } from '../../utils/error.js';

/**
 * Required OAuth scopes: calendar creation needs the full calendar scope
 */
export const GOOGLE_CALENDAR_SCOPES = [
  'https://www.googleapis.com/auth/calendar',
  'https://www.googleapis.com/auth/calendar.events',
];

/**
 * Create an OAuth2 client from configuration
 */
export function createOAuth2Client(config: GoogleStoreConfig): OAuth2Client {
  const oauth2Client = new google.auth.OAuth2(
    config.clientId,
    config.clientSecret,
    config.redirectUri
  );

  // If we have pre-authorized credentials, set them
  if (config.credentials) {
    const credentials: Credentials = {
      access_token: config.credentials.accessToken,
      refresh_token: config.credentials.refreshToken,
      expiry_date: config.credentials.tokenExpiry
        ? new Date(config.credentials.tokenExpiry).getTime()
        : undefined,
    };
    oauth2Client.setCredentials(credentials);
  }

  return oauth2Client;
}

/**
 * Get authorization URL for OAuth flow
 */
export function getAuthUrl(oauth2Client: OAuth2Client): string {
  return oauth2Client.generateAuthUrl({
    access_type: 'offline',
    scope: GOOGLE_CALENDAR_SCOPES,
    prompt: 'consent', // Force consent to get refresh token
  });
}

/**
 * Check if tokens are expired or will expire soon
 */
export function isTokenExpired(oauth2Client: OAuth2Client, bufferMs: number = 60000): boolean {
  const credentials = oauth2Client.credentials;
  if (!credentials.expiry_date) {
    // No expiry info, assume expired so a refresh is attempted
    return true;
  }
  return credentials.expiry_date <= Date.now() + bufferMs;
}

/**
 * Refresh the access token
 */
export async function refreshAccessToken(oauth2Client: OAuth2Client): Promise<Credentials> {
  try {
    const { credentials } = await oauth2Client.refreshAccessToken();
    oauth2Client.setCredentials(credentials);
    return credentials;
  } catch (error) {
    throw new SchedulerError(
      'Failed to refresh access token. Please re-authenticate.',
      ErrorCodes.AUTH_EXPIRED,
      { cause: error instanceof Error ? error : undefined }
    );
  }
}

/**
 * Ensure we have valid credentials, refreshing if necessary
 */
export async function ensureValidCredentials(oauth2Client: OAuth2Client): Promise<void> {
  const credentials = oauth2Client.credentials;

  if (!credentials.access_token && !credentials.refresh_token) {
    throw new SchedulerError(
      `No Google credentials configured. Authorize at ${getAuthUrl(oauth2Client)} and set GOOGLE_ACCESS_TOKEN / GOOGLE_REFRESH_TOKEN.`,
      ErrorCodes.AUTH_MISSING
    );
  }

  if (isTokenExpired(oauth2Client)) {
    if (!credentials.refresh_token) {
      throw new SchedulerError(
        'Access token expired and no refresh token available. Please re-authenticate.',
        ErrorCodes.AUTH_EXPIRED
      );
    }
    await refreshAccessToken(oauth2Client);
  }
}
