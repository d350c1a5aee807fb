import { BaseJob } from "../../src/capability/base-job";
import { createCapabilityRegistry } from "../../src/capability/registry";
import { ConfigurationError } from "../../src/errors";
import { JobSettingsFactory } from "../../src/settings/factory";
import { JobSettings } from "../../src/types/settings";

class IngestJob extends BaseJob {}
class IngestJobV2 extends BaseJob {}

const rawSettings = {
  ingest: {
    job_class: "acme.jobs.IngestJob",
    job_type: "ingest",
    batch_size: "200",
  },
  broken: {
    job_class: "acme.jobs.IngestJob",
    job_type: "broken",
    max_failures: "many",
  },
};

describe("JobSettingsFactory", () => {
  function makeFactory() {
    const capabilities = createCapabilityRegistry().register("acme.jobs", () => ({
      IngestJob,
    }));
    return {
      capabilities,
      factory: new JobSettingsFactory(rawSettings, { capabilities }),
    };
  }

  test("resolves configured job names", () => {
    const { factory } = makeFactory();

    const settings = factory.create("ingest");

    expect(settings.jobType).toBe("ingest");
    expect(settings.jobClass).toBe(IngestJob);
    expect(settings.batchSize).toBe(200);
  });

  test("falls back to the no-op job for unknown names", () => {
    const { factory } = makeFactory();

    const settings = factory.create("unknown-name");

    expect(settings.jobType).toBe("unknown-name");
    expect(settings.jobClass).toBe(BaseJob);
    expect(settings.batchSize).toBe(1000);
    expect(settings.schedule).toBeNull();
  });

  test("works without an explicit capability registry", () => {
    const factory = new JobSettingsFactory({});

    expect(factory.create("nightly").jobClass).toBe(BaseJob);
  });

  test("emits a diagnostic for unknown names", () => {
    const { factory } = makeFactory();
    const fallbacks: string[] = [];
    const resolved: string[] = [];

    factory
      .on("settings:fallback", ({ name }) => fallbacks.push(name))
      .on("settings:resolved", (settings) => resolved.push(settings.jobType));

    factory.create("unknown-name");
    factory.create("ingest");

    expect(fallbacks).toEqual(["unknown-name"]);
    expect(resolved).toEqual(["ingest"]);
  });

  test("re-resolves on every call", () => {
    const { factory, capabilities } = makeFactory();

    const first = factory.create("ingest");
    capabilities.register("acme.jobs", () => ({ IngestJob: IngestJobV2 }));
    const second = factory.create("ingest");

    expect(second).not.toBe(first);
    expect(first.jobClass).toBe(IngestJob);
    expect(second.jobClass).toBe(IngestJobV2);
  });

  test("throws for invalid configured settings", () => {
    const { factory } = makeFactory();

    expect(() => factory.create("broken")).toThrow(ConfigurationError);
  });

  test("a failing listener does not break resolution", () => {
    const { factory } = makeFactory();
    const errors: Error[] = [];

    factory
      .on("settings:resolved", () => {
        throw new Error("listener failed");
      })
      .on("settings:error", (err) => errors.push(err));

    let settings: JobSettings | undefined;
    expect(() => {
      settings = factory.create("ingest");
    }).not.toThrow();

    expect(settings?.jobType).toBe("ingest");
    expect(errors.map((err) => err.message)).toEqual(["listener failed"]);
  });

  test("copies raw entries at construction", () => {
    const capabilities = createCapabilityRegistry();
    const entry: Record<string, unknown> = {
      job_class: "core.jobs.BaseJob",
      job_type: "nightly",
      batch_size: 10,
    };
    const factory = new JobSettingsFactory({ nightly: entry }, { capabilities });

    entry.batch_size = 99;

    expect(factory.create("nightly").batchSize).toBe(10);
  });

  test("lists configured names", () => {
    const { factory } = makeFactory();

    expect(factory.names()).toEqual(["ingest", "broken"]);
    expect(factory.has("ingest")).toBe(true);
    expect(factory.has("toString")).toBe(false);
  });
});
