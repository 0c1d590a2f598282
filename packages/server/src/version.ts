export const SERVICE_NAME = 'chatcache';
export const VERSION = '0.1.0';
