import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Redis Cache (no URL means in-memory only)
  REDIS_URL: process.env.REDIS_URL || '',
  REDIS_PASSWORD: process.env.REDIS_PASSWORD,
  REDIS_DB: parseInt(process.env.REDIS_DB || '0', 10),
  CACHE_MODE: process.env.CACHE_MODE || 'enabled',
  CACHE_TTL: parseInt(process.env.CACHE_TTL || '86400', 10), // 1 day
  CACHE_CLEANUP_INTERVAL: parseInt(process.env.CACHE_CLEANUP_INTERVAL || '600000', 10), // 10 min

  // AI Services (all optional, heuristic inference is always available)
  OPENAI_API_KEY: process.env.OPENAI_API_KEY,
  OPENAI_MODEL: process.env.OPENAI_MODEL || 'gpt-4o-mini',
  GROQ_API_KEY: process.env.GROQ_API_KEY,
  GROQ_MODEL: process.env.GROQ_MODEL,
  ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY,
  ANTHROPIC_MODEL: process.env.ANTHROPIC_MODEL || 'claude-3-5-sonnet-20241022',
  GEMINI_API_KEY: process.env.GEMINI_API_KEY,

  // Crawling
  CRAWL_MAX_DEPTH: parseInt(process.env.CRAWL_MAX_DEPTH || '1', 10),
  CRAWL_MAX_PAGES: parseInt(process.env.CRAWL_MAX_PAGES || '10', 10),
  CRAWL_TIMEOUT: parseInt(process.env.CRAWL_TIMEOUT || '15000', 10), // 15s per request
  MAX_CONCURRENT_CRAWLS: parseInt(process.env.MAX_CONCURRENT_CRAWLS || '3', 10),
  USER_AGENT:
    process.env.USER_AGENT ||
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',

  // Minimum body length for a fetched page to count as documentation
  MIN_PAGE_LENGTH: parseInt(process.env.MIN_PAGE_LENGTH || '100', 10),

  // Resilience
  CRAWL_MAX_RETRIES: parseInt(process.env.CRAWL_MAX_RETRIES || '3', 10),
  RETRY_BACKOFF_BASE: parseInt(process.env.RETRY_BACKOFF_BASE || '500', 10),

  // Content processing & inference
  CHARS_PER_PAGE: parseInt(process.env.CHARS_PER_PAGE || '1000', 10),
  MAX_MODULES: parseInt(process.env.MAX_MODULES || '10', 10),
  INFERENCE_MAX_CHARS: parseInt(process.env.INFERENCE_MAX_CHARS || '8000', 10),

  // Output
  OUTPUT_PATH: process.env.OUTPUT_PATH || 'output/result.json',
} as const;

export default env;
