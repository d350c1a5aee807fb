import { BSON, Document } from "mongodb";
import { z } from "zod";
import { CodecError } from "../errors";
import { JobInputs, JobStates } from "../types/job";

/**
 * Bumped on any change to the field names or types below.
 */
export const CODEC_VERSION = 1;

const inputsDocument = z.object({
  v: z.literal(CODEC_VERSION),
  run_date: z.date(),
  batch_size: z.number().int().nonnegative(),
  process_interval: z.number().nonnegative(),
});

const statesDocument = z.object({
  v: z.literal(CODEC_VERSION),
  last_processed: z.string(),
  processed: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative(),
});

export function encodeInputs(inputs: JobInputs): Uint8Array {
  return BSON.serialize({
    v: CODEC_VERSION,
    run_date: inputs.runDate,
    batch_size: BSON.Long.fromNumber(inputs.batchSize),
    process_interval: new BSON.Double(inputs.processInterval),
  });
}

export function encodeStates(states: JobStates): Uint8Array {
  return BSON.serialize({
    v: CODEC_VERSION,
    last_processed: states.lastProcessed,
    processed: BSON.Long.fromNumber(states.processed),
    skipped: BSON.Long.fromNumber(states.skipped),
  });
}

function decode<T extends z.ZodTypeAny>(
  bytes: Uint8Array,
  schema: T,
  what: string
): z.infer<T> {
  let document: Document;
  try {
    // int64 counts come back as numbers while they fit in a double
    document = BSON.deserialize(bytes, { promoteLongs: true, useBigInt64: false });
  } catch (err) {
    throw new CodecError(`Failed to deserialize ${what}`, { cause: err });
  }

  const parsed = schema.safeParse(document);
  if (!parsed.success) {
    throw new CodecError(
      `Unexpected ${what} document: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")}`
    );
  }
  return parsed.data;
}

export function decodeInputs(bytes: Uint8Array): JobInputs {
  const doc = decode(bytes, inputsDocument, "job inputs");
  return {
    runDate: doc.run_date,
    batchSize: doc.batch_size,
    processInterval: doc.process_interval,
  };
}

export function decodeStates(bytes: Uint8Array): JobStates {
  const doc = decode(bytes, statesDocument, "job states");
  return {
    lastProcessed: doc.last_processed,
    processed: doc.processed,
    skipped: doc.skipped,
  };
}
