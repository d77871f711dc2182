/**
 * Manual mock for logger module
 */

const createMockLogger = (): Record<'info' | 'error' | 'warn' | 'debug' | 'child', jest.Mock> => {
  const mock = {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    child: jest.fn(),
  };
  mock.child.mockImplementation(() => mock);
  return mock;
};

export const logger = createMockLogger();

export const createLambdaLogger = jest.fn(() => createMockLogger());

export const logLambdaInvocation = jest.fn();
export const logLambdaCompletion = jest.fn();
