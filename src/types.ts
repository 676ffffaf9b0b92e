import { z } from 'zod';

/** A zone record as returned by `getZoneRecords` */
export interface ZoneRecord {
  /** Record type (TXT, A, CNAME, ...) */
  type: string;
  ttl: number;
  priority: number;
  /** Record data, e.g. the TXT value */
  rdata: string;
  recordId: number;
}

export type FetchFunction = (
  url: string,
  init?: RequestInit
) => Promise<Response>;

export const LoopiaClientOptionsSchema = z.object({
  username: z.string().min(1, 'must not be empty'),
  password: z.string().min(1, 'must not be empty'),
  /** Override the XML-RPC endpoint */
  baseUrl: z.string().url('must be a valid URL').optional(),
  /** Request timeout in milliseconds */
  timeout: z
    .number()
    .int('must be an integer')
    .positive('must be positive')
    .optional(),
  /** Override the HTTP transport (proxy, custom agent, tests) */
  fetch: z
    .custom<FetchFunction>(
      (value) => typeof value === 'function',
      'must be a function'
    )
    .optional(),
});

export type LoopiaClientOptions = z.infer<typeof LoopiaClientOptionsSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join(', ');
}

/**
 * Validate data against a schema, returning an error listing every issue.
 */
export function validateSchema<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  errorPrefix: string
): Error | null {
  const result = schema.safeParse(data);
  if (!result.success) {
    return new Error(`${errorPrefix}: ${formatIssues(result.error)}`);
  }
  return null;
}
