process.env.DOTENV_CONFIG_QUIET = 'true';

// Mock logger globally to support .child() calls (must be inline due to jest.mock hoisting)
jest.mock('../src/utils/logger.js', () => {
  const createMockLogger = (): Record<string, jest.Mock> => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    fatal: jest.fn(),
    child: jest.fn(() => createMockLogger()),
  });
  const logger = createMockLogger();
  return {
    logger,
    createModuleLogger: jest.fn(() => logger),
  };
});
