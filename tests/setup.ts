// tests/setup.ts
// Jest setup file

// Quiet logging and keep external services unconfigured
process.env.LOG_LEVEL = 'critical';
delete process.env.OPENAI_API_KEY;
delete process.env.SUPABASE_URL;
process.env.SUPABASE_SERVICE_ROLE_KEY = 'test-key';
process.env.REPORT_OUTPUT_DIR = 'test-output';
