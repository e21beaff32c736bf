/**
 * Каждый доступ к реестру выполняется одной синхронной критической секцией.
 * Повторный вход (колбэк обращается к тому же реестру) бросает ошибку.
 */
export class Guarded<T> {
  private held = false;

  constructor(
    private readonly value: T,
    readonly name = "registry"
  ) {}

  with<R>(fn: (value: T) => R): R {
    if (this.held) {
      throw new Error(`[guarded] re-entrant access to ${this.name}`);
    }
    this.held = true;
    try {
      return fn(this.value);
    } finally {
      this.held = false;
    }
  }

  isHeld() {
    return this.held;
  }
}
