/** Knowledge Retrieval API - Utility Functions */

import * as crypto from "crypto";
import { AsyncLocalStorage } from 'async_hooks';

export function sanitizeText(text: string, maxLength: number = 10000): string {
  if (!text || typeof text !== 'string') return '';
  return text.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '').normalize('NFC').trim().slice(0, maxLength);
}

export function sanitizeForLogging(text: string, maxLength: number = 100): string {
  return sanitizeText(text, maxLength).replace(/[\n\r]/g, ' ').replace(/\s+/g, ' ');
}

export function isValidTenantId(tenantId: string): boolean {
  return !!tenantId && typeof tenantId === 'string' && /^[a-zA-Z0-9_-]{1,64}$/.test(tenantId);
}

export function hashText(text: string): string {
  return crypto.createHash('sha256').update(text).digest('hex').slice(0, 16);
}

/** Escape double quotes so the query can be embedded in quoted search syntax */
export function escapeQueryForSearch(query: string): string {
  return query.replace(/"/g, '\\"');
}

export function uniqueStrings(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

interface RequestContext { requestId: string; startTime: number; path?: string; tenantId?: string; }
const requestContextStorage = new AsyncLocalStorage<RequestContext>();

export function generateRequestId(): string { return `req_${Date.now().toString(36)}_${crypto.randomBytes(4).toString('hex')}`; }
export function withRequestContext<T>(context: RequestContext, fn: () => T): T { return requestContextStorage.run({ ...context }, fn); }
export function getRequestContext(): RequestContext | undefined { return requestContextStorage.getStore(); }

function structuredLog(severity: string, message: string, data?: Record<string, unknown>, error?: unknown): void {
  const ctx = getRequestContext();
  const errorInfo = error ? (error instanceof Error ? { errorMessage: error.message, errorStack: error.stack } : { errorMessage: String(error) }) : {};
  const logFn = severity === 'ERROR' ? console.error : console.log;
  logFn(JSON.stringify({ severity, message, requestId: ctx?.requestId, tenantId: ctx?.tenantId, ...errorInfo, ...data, timestamp: new Date().toISOString() }));
}

export function logInfo(message: string, data?: Record<string, unknown>): void { structuredLog('INFO', message, data); }
export function logWarn(message: string, data?: Record<string, unknown>): void { structuredLog('WARNING', message, data); }
export function logError(message: string, error?: unknown, data?: Record<string, unknown>): void { structuredLog('ERROR', message, data, error); }

/** Wall-clock milliseconds elapsed since `start` (from Date.now()) */
export function elapsedMs(start: number): number {
  return Date.now() - start;
}
