// Only errors are logged during tests unless LOG_LEVEL is set
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'ERROR';

// Model-backed analysis is only exercised through fake transports
delete process.env.OPENAI_API_KEY;
delete process.env.TAXONOMY_DIR;
