// jest.setup.ts
import 'reflect-metadata';

// Environment the ConfigService validates when services are built in tests.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.LOG_TO_CONSOLE = 'false';
process.env.CORS_ALLOWED_ORIGINS = 'http://localhost:3000';
process.env.LEGACY_BASE_URL = 'http://legacy.test/app';
process.env.LEGACY_LOGIN_NAME = 'test-user';
process.env.LEGACY_LOGIN_PASSWORD = 'test-secret';
process.env.TASK_STOP_WAIT_MS = '200';
