// Jest setup file to configure test environment
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';

// Collaborators come from in-process fakes, never from a developer's .env
delete process.env.DATABASE_URL;
delete process.env.BROKER_URL;

jest.setTimeout(20000);
