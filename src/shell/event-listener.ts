export type Listener<T> = (payload: T) => void

type ListenerMap<Events> = {
  [K in keyof Events]?: Array<Listener<Events[K]>>
}

export class EventListener<Events extends Record<string, unknown>> {
  private listeners: ListenerMap<Events> = {}

  on<K extends keyof Events>(
    event: K,
    listener: Listener<Events[K]>,
  ) {
    const listeners = this.listeners[event]

    if (!listeners) {
      this.listeners[event] = [listener]
    } else {
      listeners.push(listener)
    }
  }

  off<K extends keyof Events>(
    event: K,
    listener: Listener<Events[K]>,
  ) {
    const listeners = this.listeners[event]

    if (listeners) {
      this.listeners[event] = listeners.filter(l => l !== listener)
    }
  }

  trigger<K extends keyof Events>(event: K, payload: Events[K]) {
    this.listeners[event]?.forEach(l => {
      l(payload)
    })
  }
}
