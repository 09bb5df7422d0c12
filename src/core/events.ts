/**
 * Type-safe event emitter.
 * A throwing listener is reported through `onListenerError` and never
 * reaches the code that emitted the event.
 */
export class TypedEmitter<M> {
  private listeners: { [E in keyof M]?: Set<(payload: M[E]) => void> } = {}

  constructor(private onListenerError: (event: keyof M, err: unknown) => void) {}

  /** Register a listener; returns its unsubscribe function */
  on<E extends keyof M>(event: E, listener: (payload: M[E]) => void): () => void {
    const set = this.listeners[event] ?? new Set<(payload: M[E]) => void>()
    this.listeners[event] = set
    set.add(listener)
    return () => {
      set.delete(listener)
    }
  }

  emit<E extends keyof M>(event: E, payload: M[E]): void {
    const set = this.listeners[event]
    if (!set) return
    for (const listener of [...set]) {
      try {
        listener(payload)
      } catch (err) {
        this.onListenerError(event, err)
      }
    }
  }

  removeAllListeners(): void {
    this.listeners = {}
  }
}
