import 'reflect-metadata';

process.env.NODE_ENV = 'test';
process.env.DATABASE_PATH = ':memory:';
process.env.DB_SYNCHRONIZE = 'true';
process.env.JWT_SECRET = 'test-secret-test-secret-test-secret';
process.env.JWT_EXPIRES_IN = '1h';
process.env.LOG_LEVEL = 'silent';
process.env.TIMEZONE = 'UTC';
process.env.WORKDAY_HOURS = '8';
