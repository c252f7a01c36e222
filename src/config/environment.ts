import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
config();

// Define environment variable schema with Zod for type-safe validation
export const envSchema = z
  .object({
    // Node environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Server configuration
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),

    // Document store driver
    STORE_DRIVER: z.enum(['supabase', 'memory']).default('supabase'),

    // Supabase configuration (required by the supabase driver)
    SUPABASE_URL: z.string().url('Invalid Supabase URL').optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, 'Supabase service role key is required').optional(),

    // JSON fixture loaded into the store at startup (useful with the memory driver)
    STORE_SEED_FILE: z.string().optional(),

    // Transaction engine
    TRANSACTION_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),

    // History ledgers
    HISTORY_DEFAULT_LOOKBACK_DAYS: z.coerce.number().int().positive().default(90),
    HISTORY_MAX_RANGE_DAYS: z.coerce.number().int().positive().default(366),
    HISTORY_DEFAULT_LIMIT: z.coerce.number().int().min(1).max(1000).default(100),

    // Batches and item cache
    BATCH_IDLE_TIMEOUT_MINUTES: z.coerce.number().positive().default(30),
    ITEM_CACHE_MAX_STALENESS_MS: z.coerce.number().int().nonnegative().default(30000),

    // Logging configuration
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

    // CORS configuration
    ALLOWED_ORIGINS: z.string().default('*'),
  })
  .superRefine((value, ctx) => {
    if (value.STORE_DRIVER !== 'supabase') return;
    if (!value.SUPABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_URL'],
        message: 'SUPABASE_URL is required when STORE_DRIVER=supabase',
      });
    }
    if (!value.SUPABASE_SERVICE_ROLE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_SERVICE_ROLE_KEY'],
        message: 'SUPABASE_SERVICE_ROLE_KEY is required when STORE_DRIVER=supabase',
      });
    }
  });

// Parse and validate environment variables
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const errorMessage = `❌ Invalid environment variables: ${JSON.stringify(parsed.error.format(), null, 2)}`;
  console.error(errorMessage);
  throw new Error(errorMessage);
}

// Export validated environment variables
export const env = parsed.data;

export const BATCH_IDLE_TIMEOUT_MS = env.BATCH_IDLE_TIMEOUT_MINUTES * 60 * 1000;

// Log environment on startup
if (env.NODE_ENV !== 'test') {
  console.log('✅ Environment variables validated successfully');
  console.log(`📝 Environment: ${env.NODE_ENV}`);
  console.log(`🗄️  Store driver: ${env.STORE_DRIVER}`);
  console.log(`🚀 Port: ${env.PORT}`);
}
