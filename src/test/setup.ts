process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'info';

// Scripts print results with console.log and the logger writes JSON lines with console.error;
// both are captured so tests can assert on them.
global.console = {
  ...console,
  log: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  info: jest.fn(),
  debug: jest.fn(),
};

afterEach(() => {
  jest.clearAllMocks();
});
