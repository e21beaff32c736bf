// Двойной буфер: emit пишет в current, drain отдаёт current и подменяет его
export class EventBus<E> {
  private queues: [E[], E[]] = [[], []];

  emit(evt: E) {
    this.queues[0].push(evt);
  }

  drain(): E[] {
    const current = this.queues[0];
    this.queues[0] = this.queues[1];
    this.queues[1] = [];
    return current;
  }

  size() {
    return this.queues[0].length;
  }

  clear() {
    this.queues = [[], []];
  }
}

export type Unsubscribe = () => void;

/** Типизированный реестр колбэков хоста. */
export class CallbackRegistry<Args extends unknown[]> {
  private handlers = new Set<(...args: Args) => void>();

  on(fn: (...args: Args) => void): Unsubscribe {
    this.handlers.add(fn);
    return () => {
      this.handlers.delete(fn);
    };
  }

  emit(...args: Args) {
    for (const h of [...this.handlers]) h(...args);
  }

  count() {
    return this.handlers.size;
  }

  clear() {
    this.handlers.clear();
  }
}
