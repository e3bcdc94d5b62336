/**
 * Tool argument validation
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, object>;
  required?: string[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function requireRecord(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new McpError(ErrorCode.InvalidParams, `${label} must be an object`);
  }
  return value;
}

export function optionalRecord(value: unknown, label: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  return requireRecord(value, label);
}

export function requireString(value: unknown, label: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new McpError(ErrorCode.InvalidParams, `Missing required parameter: ${label}`);
  }
  return value;
}

/**
 * Like requireString, but an empty string is a valid value
 */
export function requireText(value: unknown, label: string): string {
  if (typeof value !== 'string') {
    throw new McpError(ErrorCode.InvalidParams, `${label} must be a string`);
  }
  return value;
}

export function optionalPositiveInteger(value: unknown, label: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new McpError(ErrorCode.InvalidParams, `${label} must be a positive integer`);
  }
  return value;
}
