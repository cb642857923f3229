/**
 * Base Error Class
 * All pipeline errors extend this class
 */

import { v4 as uuidv4 } from 'uuid';

export interface ErrorContext {
  [key: string]: unknown;
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export abstract class AppError extends Error {
  abstract code: string;
  abstract exitCode: number;
  abstract severity: ErrorSeverity;

  context?: ErrorContext;
  errorId: string;
  timestamp: Date;
  suggestion?: string;

  constructor(
    message: string,
    context?: ErrorContext,
    suggestion?: string
  ) {
    super(message);
    this.name = new.target.name;
    this.errorId = uuidv4();
    this.timestamp = new Date();
    this.context = context;
    this.suggestion = suggestion;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      errorId: this.errorId,
      timestamp: this.timestamp.toISOString(),
      exitCode: this.exitCode,
      severity: this.severity,
      suggestion: this.suggestion,
      context: this.context
    };
  }
}
