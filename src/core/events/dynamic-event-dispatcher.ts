import { EventDispatcher, EventDispatcherProvider } from '../interfaces';

export interface DispatcherRegistration {
  remove(): void;
}

/**
 * Swappable reference to the active EventDispatcher
 *
 * The most recently registered dispatcher wins. Removing it falls back to
 * the one registered before. Callers resolve with `get()` per request so a
 * swap takes effect on the next webhook.
 */
export class DynamicEventDispatcher implements EventDispatcherProvider {
  private registrations: EventDispatcher[] = [];

  constructor(initial?: EventDispatcher) {
    if (initial) {
      this.registrations = [initial];
    }
  }

  get(): EventDispatcher | undefined {
    return this.registrations[this.registrations.length - 1];
  }

  register(dispatcher: EventDispatcher): DispatcherRegistration {
    this.registrations = [...this.registrations, dispatcher];

    return {
      remove: () => {
        const index = this.registrations.lastIndexOf(dispatcher);
        if (index !== -1) {
          this.registrations = this.registrations.filter((_, i) => i !== index);
        }
      },
    };
  }
}
