/**
 * @fileoverview Mock error-reporting module for testing
 */

import { jest } from '@jest/globals';
import type { SeverityLevel } from '@sentry/node';
import type { ErrorContext, SentryConfig } from '../error-reporting.js';

export const initErrorReporting = jest.fn<(config: SentryConfig) => boolean>(() => false);
export const reportError = jest.fn<(error: Error | string, context?: ErrorContext) => void>();
export const reportMessage = jest.fn<(message: string, level?: SeverityLevel, context?: Omit<ErrorContext, 'level'>) => void>();
export const addBreadcrumb = jest.fn<(category: string, message: string, data?: Record<string, unknown>) => void>();
export const flushErrorReports = jest.fn<(timeout?: number) => Promise<boolean>>(async () => true);

export function hashString(str: string): string {
    return `hash(${str})`;
}

