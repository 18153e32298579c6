/**
 * Tool parameter validation
 *
 * MCP clients send arbitrary JSON; each helper narrows one field or throws a
 * ValidationError naming it.
 */

import { ValidationError } from '../errors/forgeErrors.js';

export type ToolParams = Record<string, unknown>;

export class MCPValidator {
  static optionalBoolean(params: ToolParams, field: string): boolean | undefined {
    const value = params[field];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      throw new ValidationError(field, value, 'boolean');
    }
    return value;
  }

  static optionalString(params: ToolParams, field: string): string | undefined {
    const value = params[field];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string' || value.trim() === '') {
      throw new ValidationError(field, value, 'non-empty string');
    }
    return value.trim();
  }

  static optionalEnum<T extends string>(params: ToolParams, field: string, allowed: readonly T[]): T | undefined {
    const value = params[field];
    if (value === undefined || value === null) {
      return undefined;
    }
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
      throw new ValidationError(field, value, `one of ${allowed.join(', ')}`);
    }
    return match;
  }
}
