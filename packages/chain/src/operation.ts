import { z } from 'zod';
import type {
  Key,
  LegacyCreateOperation,
  LogEntry,
  Operation,
  OperationPayload,
  PlcOperation,
} from '@plclog/types';
import { KeyError, parseDidKey } from '@plclog/keys';
import { isCid } from '@plclog/codec';

export const ATPROTO_VERIFICATION_METHOD = 'atproto';
export const ATPROTO_PDS_SERVICE = 'atproto_pds';
export const ATPROTO_PDS_TYPE = 'AtprotoPersonalDataServer';

const didKeySchema = z.string().transform((value, ctx): Key => {
  try {
    return parseDidKey(value);
  } catch (err) {
    if (!(err instanceof KeyError)) throw err;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
    return z.NEVER;
  }
});

const cidSchema = z.string().refine(isCid, 'Not a dag-cbor CIDv1 in base32');

const serviceSchema = z
  .object({
    type: z.string(),
    endpoint: z.string(),
  })
  .strict();

const plcOperationSchema = z
  .object({
    type: z.literal('plc_operation'),
    rotationKeys: z.array(didKeySchema).min(1),
    verificationMethods: z.record(didKeySchema),
    alsoKnownAs: z.array(z.string()),
    services: z.record(serviceSchema),
    prev: cidSchema.nullable(),
    sig: z.string(),
  })
  .strict();

const tombstoneSchema = z
  .object({
    type: z.literal('plc_tombstone'),
    prev: cidSchema,
    sig: z.string(),
  })
  .strict();

const legacyCreateSchema = z
  .object({
    type: z.literal('create'),
    signingKey: didKeySchema,
    recoveryKey: didKeySchema,
    handle: z.string(),
    service: z.string(),
    prev: z.null(),
    sig: z.string(),
  })
  .strict();

export const operationSchema = z.discriminatedUnion('type', [
  plcOperationSchema,
  tombstoneSchema,
  legacyCreateSchema,
]);

export const logEntrySchema = z.object({
  did: z.string().optional(),
  operation: operationSchema,
  cid: cidSchema.optional(),
  createdAt: z.string().datetime({ offset: true }),
  nullified: z.boolean().default(false),
});

export type ParsedLogEntry =
  | { readonly ok: true; readonly entry: LogEntry }
  | {
      readonly ok: false;
      readonly reason: string;
      /** `prev` as written, when the entry carries a string there */
      readonly prev?: string;
      readonly cid?: string;
    };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

const rawLinkSchema = z
  .object({
    cid: z.string().optional(),
    operation: z.object({ prev: z.string().nullish() }).passthrough(),
  })
  .passthrough();

export function parseOperation(raw: unknown): Operation {
  return operationSchema.parse(raw);
}

/** Shape-check one audit-log entry, keeping its raw link fields when it fails. */
export function parseLogEntry(raw: unknown): ParsedLogEntry {
  const result = logEntrySchema.safeParse(raw);
  if (result.success) {
    return { ok: true, entry: result.data };
  }

  const link = rawLinkSchema.safeParse(raw);
  return {
    ok: false,
    reason: formatIssues(result.error),
    prev: link.success ? link.data.operation.prev ?? undefined : undefined,
    cid: link.success ? link.data.cid : undefined,
  };
}

/**
 * The identity fields an operation sets.
 * Legacy `create` operations are read as rotation keys [recovery, signing],
 * the signing key as the `atproto` method, the handle as an `at://` alias
 * and the service as the PDS.
 */
export function operationPayload(op: PlcOperation | LegacyCreateOperation): OperationPayload {
  if (op.type === 'plc_operation') {
    const { rotationKeys, verificationMethods, alsoKnownAs, services } = op;
    return { rotationKeys, verificationMethods, alsoKnownAs, services };
  }

  return {
    rotationKeys: [op.recoveryKey, op.signingKey],
    verificationMethods: { [ATPROTO_VERIFICATION_METHOD]: op.signingKey },
    alsoKnownAs: [op.handle.startsWith('at://') ? op.handle : `at://${op.handle}`],
    services: {
      [ATPROTO_PDS_SERVICE]: { type: ATPROTO_PDS_TYPE, endpoint: op.service },
    },
  };
}

/** Keys allowed to sign the successor of `op`; a tombstone has none. */
export function rotationKeysOf(op: Operation): readonly Key[] {
  return op.type === 'plc_tombstone' ? [] : operationPayload(op).rotationKeys;
}
