import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { logger } from './logger';
import { env } from './environment';
import type { DocumentStore } from '../repositories/document-store';
import { SupabaseDocumentStore } from '../repositories/supabase-document-store';
import { MemoryDocumentStore } from '../repositories/memory-document-store';

// Singleton Supabase client instance
let supabaseClient: SupabaseClient | null = null;

/**
 * Get or create Supabase client instance (singleton pattern)
 *
 * Configuration:
 * - Uses service role key for admin access (bypasses RLS)
 * - Disables auth (no user sessions needed for API-only application)
 */
export const getSupabaseClient = (): SupabaseClient => {
  if (!supabaseClient) {
    if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY) {
      throw new Error('Supabase is not configured (SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY)');
    }

    supabaseClient = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
      db: {
        schema: 'public',
      },
    });

    logger.info('Supabase client initialized', {
      url: env.SUPABASE_URL,
      schema: 'public',
    });
  }

  return supabaseClient;
};

/**
 * Build the document store selected by STORE_DRIVER
 */
export const createDocumentStore = (): DocumentStore => {
  if (env.STORE_DRIVER === 'memory') {
    logger.warn('Using in-memory document store; data is lost on restart');
    return new MemoryDocumentStore({ maxAttempts: env.TRANSACTION_MAX_ATTEMPTS });
  }

  return new SupabaseDocumentStore(getSupabaseClient(), {
    maxAttempts: env.TRANSACTION_MAX_ATTEMPTS,
  });
};

/**
 * Close database connection (for graceful shutdown)
 */
export const closeConnection = async (): Promise<void> => {
  if (supabaseClient) {
    await supabaseClient.removeAllChannels();
    supabaseClient = null;
    logger.info('Supabase client connection closed');
  }
};
