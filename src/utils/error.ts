import { ZodError } from 'zod';
import { HarnessError } from '../types';

// Format error for MCP response
export function formatErrorForResponse(error: unknown): string {
  if (error instanceof HarnessError) {
    let message = `${error.code}: ${error.message}`;

    if (error.suggestion) {
      message += `\n\nSuggestion: ${error.suggestion}`;
    }

    return message;
  }

  if (error instanceof ZodError) {
    const issues = error.issues.map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`);
    return `INVALID_INPUT: ${issues.join('; ')}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
