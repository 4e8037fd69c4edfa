import { ErrorCode, ILayeringError } from '../types';
import { LayeringError } from './errors';

export class ErrorHandler {
  static isLayeringError(error: unknown): error is ILayeringError {
    return error instanceof LayeringError;
  }

  static hasCode(error: unknown, code: ErrorCode): boolean {
    return this.isLayeringError(error) && error.code === code;
  }

  // Programmer errors: the build should stop, not retry
  static isStructuralError(error: unknown): boolean {
    return this.hasCode(error, ErrorCode.LayerViolation) ||
           this.hasCode(error, ErrorCode.ReflexiveLoad);
  }

  static formatError(error: unknown): string {
    if (this.isLayeringError(error)) {
      return `[${error.code}] ${error.message}`;
    }
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }
}
