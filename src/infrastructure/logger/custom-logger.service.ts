import { ConsoleLogger, Injectable } from '@nestjs/common';

export interface LogMetadata {
  [key: string]: unknown;
}

interface FormattedLog {
  message: string;
  /** Params after the metadata, in Nest's order */
  rest: unknown[];
}

/**
 * ConsoleLogger that accepts a metadata object as second argument.
 * Custom calls: `logger.log('Circle created', { circleId })`
 *   → `[create] Circle created {"circleId":1}`
 * Nest's own calls (`message, context` or `message, stack, context`) pass through untouched.
 */
@Injectable()
export class LoggerService extends ConsoleLogger {
  constructor(context: string = '') {
    super(context);
  }

  log(message: string, ...optionalParams: unknown[]) {
    const { message: text, rest } = this.format(message, optionalParams);
    const [context] = rest;
    if (typeof context === 'string') {
      super.log(text, context);
    } else {
      super.log(text);
    }
  }

  error(message: string, ...optionalParams: unknown[]) {
    const { message: text, rest } = this.format(message, optionalParams);
    const [stackOrContext, context] = rest;
    if (typeof stackOrContext === 'string' && typeof context === 'string') {
      super.error(text, stackOrContext, context);
    } else if (typeof stackOrContext === 'string') {
      super.error(text, stackOrContext);
    } else {
      super.error(text);
    }
  }

  warn(message: string, ...optionalParams: unknown[]) {
    const { message: text, rest } = this.format(message, optionalParams);
    const [context] = rest;
    if (typeof context === 'string') {
      super.warn(text, context);
    } else {
      super.warn(text);
    }
  }

  debug(message: string, ...optionalParams: unknown[]) {
    const { message: text, rest } = this.format(message, optionalParams);
    const [context] = rest;
    if (typeof context === 'string') {
      super.debug(text, context);
    } else {
      super.debug(text);
    }
  }

  verbose(message: string, ...optionalParams: unknown[]) {
    const { message: text, rest } = this.format(message, optionalParams);
    const [context] = rest;
    if (typeof context === 'string') {
      super.verbose(text, context);
    } else {
      super.verbose(text);
    }
  }

  private format(message: string, optionalParams: unknown[]): FormattedLog {
    const [first, ...others] = optionalParams;

    // method names are only resolved for custom calls
    if (!isMetadata(first)) {
      return { message: String(message), rest: optionalParams };
    }

    const parts: string[] = [];
    const methodName = this.getCallerMethodName();
    if (methodName) {
      parts.push(`[${methodName}]`);
    }
    parts.push(String(message));
    if (Object.keys(first).length > 0) {
      parts.push(JSON.stringify(first));
    }

    return { message: parts.join(' '), rest: others };
  }

  /** First stack frame outside the logger classes, as `methodName`. */
  private getCallerMethodName(): string {
    const stack = new Error().stack;
    if (!stack) return '';

    for (const line of stack.split('\n')) {
      if (line.includes('Logger')) {
        continue;
      }

      // "    at ClassName.methodName (/path/to/file.ts:line:column)"
      const match = line.match(/at\s+(?:(\w+)\.)?(\w+)\s+\(/);
      if (match) {
        return match[2];
      }
    }

    return '';
  }
}

function isMetadata(value: unknown): value is LogMetadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
