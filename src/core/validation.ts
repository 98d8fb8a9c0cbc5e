import type { ZodError } from 'zod';
import { ConfigurationError } from './errors.js';

export const mustBePositive = (value: number, name: string): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number`, { [name]: value });
  }
};

export const mustBeNonNegativeInteger = (value: number, name: string): void => {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer`, { [name]: value });
  }
};

/** `path: message` pairs joined with `; `. An empty path reads as `(root)`. */
export const formatIssues = (error: ZodError): string =>
  error.issues.map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`).join('; ');
