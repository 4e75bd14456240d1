import { z } from 'zod';

/**
 * ChangeState: lifecycle position of a change instance.
 *
 * The happy path is PENDING → APPROVED → COMPLETED. REJECTED, ERROR and
 * CLOSED are terminal states set by the service or by its reviewers.
 * Transition legality is enforced server-side; this enum only guards
 * against typos before a request is sent.
 */
export const ChangeState = z.enum([
  'PENDING',
  'APPROVED',
  'REJECTED',
  'COMPLETED',
  'ERROR',
  'CLOSED',
]);

export type ChangeState = z.infer<typeof ChangeState>;

export const STATE_APPROVED: ChangeState = 'APPROVED';
export const STATE_COMPLETED: ChangeState = 'COMPLETED';

/** Caller-defined payload; any JSON value */
export const JsonValue: z.ZodType<unknown> = z.unknown();

/** Opaque JSON object (description, deployed item) */
export const JsonObject = z.record(z.string(), z.unknown());

export type JsonObject = z.infer<typeof JsonObject>;

// ---------------------------------------------------------------------------
// Connection parameters shared by every operation
// ---------------------------------------------------------------------------

function isHttpUrl(value: string): boolean {
  if (!URL.canParse(value)) return false;
  const { protocol, hostname } = new URL(value);
  return (protocol === 'http:' || protocol === 'https:') && hostname.length > 0;
}

export const httpUrl = z.string().superRefine((value, ctx) => {
  if (!isHttpUrl(value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `${value} is not a valid url`,
    });
  }
});

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const connectionShape = z.object({
  url: httpUrl,
  apiKey: optionalSecret,
  username: optionalSecret,
  password: optionalSecret,
});

type ConnectionShape = z.infer<typeof connectionShape>;

/**
 * Either `apiKey`, or both `username` and `password`. Empty strings count
 * as absent.
 */
function requireCredential(params: ConnectionShape, ctx: z.RefinementCtx): void {
  if (params.apiKey) return;
  if (!params.username || !params.password) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'If no apiKey is specified, username and password are required',
      path: ['apiKey'],
    });
  }
}

export const ConnectionParams = connectionShape.superRefine(requireCredential);

export type ConnectionParams = z.infer<typeof ConnectionParams>;

// ---------------------------------------------------------------------------
// Per-operation parameters
// ---------------------------------------------------------------------------

const serviceName = z.string().trim().min(1, 'serviceName is required');

export const GetChangesParams = connectionShape
  .extend({
    state: ChangeState.default('APPROVED'),
    serviceName: z.string().trim().min(1).optional(),
  })
  .superRefine(requireCredential);

export type GetChangesParams = z.infer<typeof GetChangesParams>;

export const GetServiceItemsParams = connectionShape
  .extend({
    serviceName,
  })
  .superRefine(requireCredential);

export type GetServiceItemsParams = z.infer<typeof GetServiceItemsParams>;

export const UpdateChangeParams = connectionShape
  .extend({
    uuid: z.string().trim().min(1, 'uuid is required'),
    state: ChangeState,
    deployedItem: JsonValue.optional(),
    description: JsonObject.optional(),
    dryRun: z.boolean().default(false),
  })
  .superRefine(requireCredential);

export type UpdateChangeParams = z.infer<typeof UpdateChangeParams>;

export const CompleteChangesParams = connectionShape
  .extend({
    serviceName,
    deployedItem: JsonValue.refine((value) => value !== undefined && value !== null, {
      message: 'deployedItem is required',
    }),
    dryRun: z.boolean().default(false),
  })
  .superRefine(requireCredential);

export type CompleteChangesParams = z.infer<typeof CompleteChangesParams>;
