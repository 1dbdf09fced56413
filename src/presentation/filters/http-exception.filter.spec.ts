/**
 * Unit Tests - HttpExceptionFilter
 *
 * Covers the mapping of Nest HttpExceptions and DomainErrors to the
 * error response body, and the log level chosen for each status class.
 */

import { ArgumentsHost, BadRequestException, HttpException, HttpStatus, NotFoundException } from '@nestjs/common';
import { DataIntegrityError, NotFoundError, StoreError, ValidationError } from '@/domain/errors';
import { HttpExceptionFilter } from './http-exception.filter';

describe('HttpExceptionFilter', () => {
  let filter: HttpExceptionFilter;
  let mockResponse: {
    status: jest.Mock;
    send: jest.Mock;
  };
  let mockRequest: {
    url: string;
  };
  let mockHost: ArgumentsHost;
  let loggerErrorSpy: jest.SpyInstance;
  let loggerWarnSpy: jest.SpyInstance;

  beforeEach(() => {
    filter = new HttpExceptionFilter();

    mockResponse = {
      status: jest.fn().mockReturnThis(),
      send: jest.fn(),
    };

    mockRequest = {
      url: '/circle/1',
    };

    mockHost = {
      switchToHttp: jest.fn().mockReturnValue({
        getResponse: () => mockResponse,
        getRequest: () => mockRequest,
      }),
    } as unknown as ArgumentsHost;

    const logger = (filter as unknown as { logger: { error: jest.Mock; warn: jest.Mock } }).logger;
    loggerErrorSpy = jest.spyOn(logger, 'error').mockImplementation(() => {});
    loggerWarnSpy = jest.spyOn(logger, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('DomainError handling', () => {
    it('should answer 400 for ValidationError with its message', () => {
      filter.catch(new ValidationError('grade must be an integer between 1 and 4', 'grade'), mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.BAD_REQUEST);
      expect(mockResponse.send).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: 400,
          message: 'grade must be an integer between 1 and 4',
          error: 'Bad Request',
        }),
      );
    });

    it('should answer 404 for NotFoundError', () => {
      filter.catch(new NotFoundError('Circle not found'), mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.NOT_FOUND);
      expect(mockResponse.send).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: 404,
          message: 'Circle not found',
          error: 'Not Found',
        }),
      );
    });

    it('should answer 500 without details for DataIntegrityError', () => {
      filter.catch(new DataIntegrityError('Owner not found'), mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.INTERNAL_SERVER_ERROR);
      expect(mockResponse.send).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: 500,
          message: 'Internal server error',
          error: 'Internal Server Error',
        }),
      );
    });

    it('should answer 500 without details for StoreError', () => {
      filter.catch(new StoreError('Failed to create circle', new Error('SQLITE_BUSY')), mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.INTERNAL_SERVER_ERROR);
      expect(mockResponse.send).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: 500,
          message: 'Internal server error',
        }),
      );
    });
  });

  describe('HttpException handling', () => {
    it('should handle NotFoundException', () => {
      filter.catch(new NotFoundException('Cannot GET /nowhere'), mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.NOT_FOUND);
      expect(mockResponse.send).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: 404,
          message: 'Cannot GET /nowhere',
          error: 'Not Found',
        }),
      );
    });

    it('should handle BadRequestException with validation errors (array)', () => {
      const exception = new BadRequestException({
        message: ['capacity must be an integer number', 'property extra should not exist'],
        error: 'Bad Request',
      });

      filter.catch(exception, mockHost);

      expect(mockResponse.send).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: 400,
          message: ['capacity must be an integer number', 'property extra should not exist'],
          error: 'Bad Request',
        }),
      );
    });

    it('should handle HttpException with string response', () => {
      filter.catch(new HttpException('Forbidden resource', HttpStatus.FORBIDDEN), mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.FORBIDDEN);
      expect(mockResponse.send).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: 403,
          message: 'Forbidden resource',
          error: 'Forbidden',
        }),
      );
    });

    it('should handle HttpException with object response', () => {
      const exception = new HttpException(
        { message: 'Custom error', error: 'CustomError' },
        HttpStatus.UNPROCESSABLE_ENTITY,
      );

      filter.catch(exception, mockHost);

      expect(mockResponse.send).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: 422,
          message: 'Custom error',
          error: 'CustomError',
        }),
      );
    });
  });

  describe('unknown errors', () => {
    it('should hide the message of a generic Error', () => {
      filter.catch(new Error('SQLITE_CONSTRAINT: UNIQUE constraint failed'), mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.INTERNAL_SERVER_ERROR);
      expect(mockResponse.send).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: 500,
          message: 'Internal server error',
          error: 'Internal Server Error',
        }),
      );
    });

    it('should handle a thrown string', () => {
      filter.catch('Just a string error', mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.INTERNAL_SERVER_ERROR);
    });

    it('should handle null', () => {
      filter.catch(null, mockHost);

      expect(mockResponse.status).toHaveBeenCalledWith(HttpStatus.INTERNAL_SERVER_ERROR);
    });
  });

  describe('response structure', () => {
    it('should include an ISO timestamp and the request path', () => {
      mockRequest.url = '/circle/42';

      filter.catch(new NotFoundError('Circle not found'), mockHost);

      const response = mockResponse.send.mock.calls[0][0];
      expect(response.path).toBe('/circle/42');
      expect(new Date(response.timestamp).toISOString()).toBe(response.timestamp);
    });
  });

  describe('logging', () => {
    it('should log error with the stack for 5xx', () => {
      filter.catch(new Error('Server error'), mockHost);

      expect(loggerErrorSpy).toHaveBeenCalledWith(
        'Internal error',
        expect.objectContaining({
          error: expect.any(Object),
          cause: 'Server error',
          stack: expect.stringContaining('Server error'),
        }),
      );
      expect(loggerWarnSpy).not.toHaveBeenCalled();
    });

    it('should log warn for 4xx', () => {
      filter.catch(new ValidationError('circle name must not be empty', 'name'), mockHost);

      expect(loggerWarnSpy).toHaveBeenCalledWith(
        'Request error',
        expect.objectContaining({
          error: expect.any(Object),
        }),
      );
      expect(loggerErrorSpy).not.toHaveBeenCalled();
    });
  });
});
