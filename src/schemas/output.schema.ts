import { z } from 'zod';

// ---------------------------------------------------------------------------
// Server documents
//
// Every record schema is `passthrough`: the client keeps whatever the server
// sends and only insists on the fields it reads.
// ---------------------------------------------------------------------------

export const ServiceRef = z
  .object({
    name: z.string(),
  })
  .passthrough();

export const ServiceItem = z
  .object({
    name: z.string(),
    service: ServiceRef,
  })
  .passthrough();

export type ServiceItem = z.infer<typeof ServiceItem>;

export const ChangeInstance = z
  .object({
    uuid: z.string(),
    /** As reported by the server; never derived client-side */
    state: z.string(),
    service_item: ServiceItem,
    deployed_item: z.unknown().optional(),
    description: z.record(z.string(), z.unknown()).nullable().optional(),
  })
  .passthrough();

export type ChangeInstance = z.infer<typeof ChangeInstance>;

/**
 * Envelope of a list endpoint. `results` is validated separately, and only
 * when `count > 0`.
 */
export const PageHeader = z
  .object({
    count: z.number().int().nonnegative(),
    next: z.string().nullable().optional(),
    previous: z.string().nullable().optional(),
    results: z.unknown().optional(),
  })
  .passthrough();

export type PageHeader = z.infer<typeof PageHeader>;

export const TokenResponse = z.object({
  token: z.string().min(1),
});

export type TokenResponse = z.infer<typeof TokenResponse>;

/** Any JSON object, returned verbatim */
export const UpdateResponse = z.record(z.string(), z.unknown());

export type UpdateResponse = z.infer<typeof UpdateResponse>;

// ---------------------------------------------------------------------------
// Workflow output
// ---------------------------------------------------------------------------

export const CompletionOutcome = z.discriminatedUnion('status', [
  z.object({ uuid: z.string(), status: z.literal('completed') }),
  z.object({ uuid: z.string(), status: z.literal('skipped') }),
  z.object({ uuid: z.string(), status: z.literal('failed'), error: z.string() }),
]);

export type CompletionOutcome = z.infer<typeof CompletionOutcome>;

export const CompletionReport = z.object({
  /** Updates that succeeded in this run */
  count: z.number().int().nonnegative(),
  message: z.string(),
  successful: z.boolean(),
  /** One entry per instance attempted, in order */
  outcomes: z.array(CompletionOutcome),
});

export type CompletionReport = z.infer<typeof CompletionReport>;
