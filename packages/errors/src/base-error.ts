/**
 * Base Error Class
 * All custom errors extend this class
 */

import { v4 as uuidv4 } from 'uuid';

export type ErrorContext = Record<string, unknown>;

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export interface SerializedError {
  error: string;
  message: string;
  errorId: string;
  timestamp: string;
  statusCode: number;
  severity: ErrorSeverity;
  suggestion?: string;
  context?: ErrorContext;
}

export abstract class AppError extends Error {
  abstract code: string;
  abstract statusCode: number;
  abstract severity: ErrorSeverity;

  context?: ErrorContext;
  errorId: string;
  timestamp: Date;
  isOperational: boolean;
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
    this.isOperational = true;
    this.context = context;
    this.suggestion = suggestion;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): SerializedError {
    return {
      error: this.code,
      message: this.message,
      errorId: this.errorId,
      timestamp: this.timestamp.toISOString(),
      statusCode: this.statusCode,
      severity: this.severity,
      suggestion: this.suggestion,
      context: process.env.NODE_ENV === 'production' ? undefined : this.context
    };
  }
}
