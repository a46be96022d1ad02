// Global test setup.

// Timestamps in assertions are UTC
process.env.TZ = 'UTC';
