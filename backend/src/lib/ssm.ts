import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import { config } from './config.js';
import { logger } from './logger.js';

const ssmClient = new SSMClient({ region: config.region });

// Secret values are cached for 60 seconds to avoid excessive SSM calls
const CACHE_TTL_MS = 60_000;
const cache = new Map<string, { value: string; expiresAt: number }>();

/**
 * Read a SecureString parameter. When no parameter name is configured the
 * named environment variable is used instead. Returns '' when unavailable.
 */
export async function getSecret(paramName: string, envFallback: string): Promise<string> {
  if (!paramName) {
    return process.env[envFallback] || '';
  }

  const now = Date.now();
  const cached = cache.get(paramName);
  if (cached && now < cached.expiresAt) {
    return cached.value;
  }

  try {
    const response = await ssmClient.send(
      new GetParameterCommand({ Name: paramName, WithDecryption: true })
    );
    const value = response.Parameter?.Value || '';
    cache.set(paramName, { value, expiresAt: now + CACHE_TTL_MS });
    return value;
  } catch (error) {
    logger.error({ error, paramName }, 'Failed to read SSM parameter');
    // Serve a stale value rather than locking everyone out
    return cached?.value || '';
  }
}

export function getSharedSecret(): Promise<string> {
  return getSecret(config.secrets.sharedSecretParam, 'SHARED_SECRET');
}

export function getMistralApiKey(): Promise<string> {
  return getSecret(config.secrets.mistralApiKeyParam, 'MISTRAL_API_KEY');
}

/**
 * Clear the secret cache (useful for testing)
 */
export function clearSecretCache(): void {
  cache.clear();
}
