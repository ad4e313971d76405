/**
 * Global test setup for Vitest
 * This file runs before each test file is imported, so the environment set
 * here is what server/config.ts reads.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent'; // Suppress logs during tests
process.env.USE_MEM_STORAGE = 'true';
delete process.env.DATABASE_URL;
delete process.env.ADMIN_GROUP;

// No Firebase credentials: auth uses the x-dev-* header fallback
delete process.env.FIREBASE_PROJECT_ID;
delete process.env.FIREBASE_CLIENT_EMAIL;
delete process.env.FIREBASE_PRIVATE_KEY;
