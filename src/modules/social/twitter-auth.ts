// ===========================================
// TWITTER AUTH UTILITY
// Generates Bearer Token from Consumer Key/Secret
// ===========================================

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';

const TOKEN_URL = 'https://api.twitter.com/oauth2/token';

const tokenResponseSchema = z.object({
  token_type: z.string(),
  access_token: z.string().min(1),
});

export interface TwitterCredentials {
  bearerToken?: string;
  consumerKey?: string;
  consumerSecret?: string;
}

/**
 * Generate a Twitter API Bearer Token from Consumer Key and Secret
 * Uses OAuth 2.0 Client Credentials flow
 */
export async function generateBearerToken(
  consumerKey: string,
  consumerSecret: string,
  client: AxiosInstance = axios
): Promise<string> {
  const credentials = Buffer.from(`${consumerKey}:${consumerSecret}`).toString('base64');

  const response = await client.post(TOKEN_URL, 'grant_type=client_credentials', {
    headers: {
      'Authorization': `Basic ${credentials}`,
      'Content-Type': 'application/x-www-form-urlencoded;charset=UTF-8',
    },
  });

  const parsed = tokenResponseSchema.safeParse(response.data);
  if (!parsed.success || parsed.data.token_type.toLowerCase() !== 'bearer') {
    throw new Error('Unexpected token type received');
  }

  logger.info('Generated Twitter Bearer Token from consumer keys');
  return parsed.data.access_token;
}

/**
 * Get a valid Bearer Token - either configured directly or generated from consumer keys
 */
export async function getTwitterBearerToken(
  credentials: TwitterCredentials,
  client: AxiosInstance = axios
): Promise<string | null> {
  if (credentials.bearerToken) {
    return credentials.bearerToken;
  }

  if (credentials.consumerKey && credentials.consumerSecret) {
    try {
      return await generateBearerToken(credentials.consumerKey, credentials.consumerSecret, client);
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Could not generate Twitter Bearer Token');
      return null;
    }
  }

  logger.warn('No Twitter credentials available');
  return null;
}
