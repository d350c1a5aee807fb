import { BSON } from "mongodb";
import { CodecError } from "../../src/errors";
import {
  CODEC_VERSION,
  decodeInputs,
  decodeStates,
  encodeInputs,
  encodeStates,
} from "../../src/record/codec";

describe("Inputs/States codec", () => {
  test("inputs survive encoding", () => {
    const inputs = {
      runDate: new Date("2024-03-05T07:08:09.123Z"),
      batchSize: 500,
      processInterval: 0.25,
    };

    expect(decodeInputs(encodeInputs(inputs))).toEqual(inputs);
  });

  test("states survive encoding", () => {
    const states = { lastProcessed: "row-17", processed: 17, skipped: 2 };

    expect(decodeStates(encodeStates(states))).toEqual(states);
  });

  test("writes versioned documents with stable field names", () => {
    const doc = BSON.deserialize(
      encodeStates({ lastProcessed: "", processed: 0, skipped: 0 })
    );

    expect(doc).toEqual({
      v: CODEC_VERSION,
      last_processed: "",
      processed: 0,
      skipped: 0,
    });
  });

  test("keeps a whole process interval as a double", () => {
    const bytes = encodeInputs({
      runDate: new Date(0),
      batchSize: 1,
      processInterval: 3,
    });
    const doc = BSON.deserialize(bytes, { promoteValues: false });

    expect(doc.process_interval).toBeInstanceOf(BSON.Double);
    expect(decodeInputs(bytes).processInterval).toBe(3);
  });

  test("counts beyond 32 bits keep their value", () => {
    const inputs = {
      runDate: new Date(0),
      batchSize: 5_000_000_000,
      processInterval: 0,
    };
    const states = { lastProcessed: "", processed: 4_294_967_300, skipped: 3_000_000_000 };

    expect(decodeInputs(encodeInputs(inputs)).batchSize).toBe(5_000_000_000);
    expect(decodeStates(encodeStates(states))).toEqual(states);
  });

  test("writes counts as int64", () => {
    const doc = BSON.deserialize(
      encodeStates({ lastProcessed: "", processed: 7, skipped: 0 }),
      { promoteLongs: false }
    );

    expect(doc.processed).toBeInstanceOf(BSON.Long);
    expect(doc.processed.toNumber()).toBe(7);
  });

  test("rejects bytes that are not a document", () => {
    expect(() => decodeInputs(new Uint8Array([1, 2, 3]))).toThrow(CodecError);
  });

  test("rejects an unknown version", () => {
    const bytes = BSON.serialize({
      v: CODEC_VERSION + 1,
      last_processed: "",
      processed: 0,
      skipped: 0,
    });

    expect(() => decodeStates(bytes)).toThrow(CodecError);
  });

  test("rejects a document of the wrong shape", () => {
    const inputs = encodeInputs({
      runDate: new Date(0),
      batchSize: 1,
      processInterval: 0,
    });

    expect(() => decodeStates(inputs)).toThrow(/^Unexpected job states document: /);
  });
});
