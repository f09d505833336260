/** Injection token of the shared Redis client; resolves to null when REDIS_URL is not set */
export const REDIS_CLIENT = 'REDIS_CLIENT';
