import { EventEmitter } from "events";

export type EventMap = Record<string, unknown>;

export class TypedEventEmitter<T extends EventMap> {
  private emitter = new EventEmitter();

  on<K extends keyof T & string>(event: K, listener: (payload: T[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends keyof T & string>(event: K, listener: (payload: T[K]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends keyof T & string>(event: K, listener: (payload: T[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  protected emitUnsafe<K extends keyof T & string>(event: K, payload: T[K]): void {
    this.emitter.emit(event, payload);
  }
}
