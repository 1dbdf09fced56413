import { ConsoleLogger } from '@nestjs/common';
import { LoggerService } from './custom-logger.service';

describe('LoggerService', () => {
  let logger: LoggerService;
  let consoleLog: jest.SpyInstance;
  let consoleError: jest.SpyInstance;

  beforeEach(() => {
    consoleLog = jest.spyOn(ConsoleLogger.prototype, 'log').mockImplementation(() => {});
    consoleError = jest.spyOn(ConsoleLogger.prototype, 'error').mockImplementation(() => {});
    logger = new LoggerService('CircleService');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should append metadata as JSON', () => {
    logger.log('Circle created', { circleId: 1 });

    expect(consoleLog).toHaveBeenCalledWith(expect.stringMatching(/Circle created \{"circleId":1\}$/));
  });

  it('should leave the message alone for empty metadata', () => {
    logger.log('Circle created', {});

    expect(consoleLog).toHaveBeenCalledWith(expect.stringMatching(/Circle created$/));
  });

  it('should pass a Nest context through', () => {
    logger.log('Mapped {/circle, POST} route', 'RouterExplorer');

    expect(consoleLog).toHaveBeenCalledWith('Mapped {/circle, POST} route', 'RouterExplorer');
  });

  it('should keep the stack before the context on Nest error calls', () => {
    logger.error('Unhandled', 'Error: boom\n    at handler', 'ExceptionsHandler');

    expect(consoleError).toHaveBeenCalledWith('Unhandled', 'Error: boom\n    at handler', 'ExceptionsHandler');
  });

  it('should not forward absent params', () => {
    logger.error('Failed to create circle', { error: 'disk I/O error' });

    expect(consoleError).toHaveBeenCalledTimes(1);
    expect(consoleError.mock.calls[0]).toHaveLength(1);
    expect(consoleError.mock.calls[0][0]).toMatch(/Failed to create circle \{"error":"disk I\/O error"\}$/);
  });
});
