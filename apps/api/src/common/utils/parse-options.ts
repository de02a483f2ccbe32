import type { z } from 'zod';
import { ConfigurationError } from '@sheetmap/shared';

/** Parse caller options with their schema; failures become a ConfigurationError listing each issue */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: i.path.join('.'),
      message: i.message,
    }));
    const summary = issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid ${what}: ${summary}`, { issues });
  }
  return result.data;
}
