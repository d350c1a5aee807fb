import { JobClass } from "../types/job";
import { NotFoundError, ResolutionError } from "../errors";
import { BaseJob } from "./base-job";

export type CapabilityContainer = Readonly<Record<string, JobClass>>;

export type ContainerLoader = () => CapabilityContainer;

type CacheEntry =
  | { state: "initializing" }
  | { state: "ready"; container: CapabilityContainer };

export const BUILTIN_CONTAINER = "core.jobs";
export const NOOP_JOB_IDENTIFIER = `${BUILTIN_CONTAINER}.BaseJob`;

/**
 * Maps dotted identifiers ("container.path.Symbol") to job classes.
 *
 * Containers are registered up front with a loader; a loader runs the first
 * time one of its symbols is resolved and its result is cached.
 */
export class CapabilityRegistry {
  private readonly loaders = new Map<string, ContainerLoader>();
  private readonly cache = new Map<string, CacheEntry>();

  register(containerPath: string, loader: ContainerLoader): this {
    if (!containerPath) {
      throw new ResolutionError("Container path must not be empty");
    }
    this.loaders.set(containerPath, loader);
    this.cache.delete(containerPath);
    return this;
  }

  resolve(identifier: string): JobClass {
    const { containerPath, symbol } = splitIdentifier(identifier);
    const container = this.load(containerPath);

    if (!Object.prototype.hasOwnProperty.call(container, symbol)) {
      throw new NotFoundError(
        `Container "${containerPath}" does not define a "${symbol}" capability`
      );
    }

    return container[symbol];
  }

  has(identifier: string): boolean {
    try {
      this.resolve(identifier);
      return true;
    } catch (err) {
      if (err instanceof ResolutionError || err instanceof NotFoundError) {
        return false;
      }
      throw err;
    }
  }

  private load(containerPath: string): CapabilityContainer {
    const cached = this.cache.get(containerPath);

    // an entry still initializing is not safe to hand out; load again
    if (cached?.state === "ready") {
      return cached.container;
    }

    const loader = this.loaders.get(containerPath);
    if (!loader) {
      throw new NotFoundError(`No container registered as "${containerPath}"`);
    }

    this.cache.set(containerPath, { state: "initializing" });

    let container: CapabilityContainer;
    try {
      container = loader();
    } catch (err) {
      this.cache.delete(containerPath);
      throw new NotFoundError(`Failed to load container "${containerPath}"`, {
        cause: err,
      });
    }

    this.cache.set(containerPath, { state: "ready", container });
    return container;
  }
}

function splitIdentifier(identifier: string): {
  containerPath: string;
  symbol: string;
} {
  const separator = identifier.lastIndexOf(".");

  if (separator <= 0 || separator === identifier.length - 1) {
    throw new ResolutionError(
      `"${identifier}" doesn't look like a capability path`
    );
  }

  return {
    containerPath: identifier.slice(0, separator),
    symbol: identifier.slice(separator + 1),
  };
}

export function createCapabilityRegistry(): CapabilityRegistry {
  return new CapabilityRegistry().register(BUILTIN_CONTAINER, () => ({
    BaseJob,
  }));
}
