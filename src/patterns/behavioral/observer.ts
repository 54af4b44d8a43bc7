/**
 * Observer: price listeners subscribe to a ticker and can unsubscribe.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';
import { requireSetup } from '../shared.js';

type Listener<T> = (value: T) => void;

class Subject<T> {
  private readonly listeners = new Set<Listener<T>>();

  /** Returns an unsubscribe function. */
  subscribe(listener: Listener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  notify(value: T): void {
    for (const listener of this.listeners) {
      listener(value);
    }
  }
}

interface Quote {
  symbol: string;
  price: number;
}

const ALERT_THRESHOLD = 100;

export const OBSERVER_OUTCOME = [
  'display: ACME at 99',
  'display: ACME at 101',
  'alert: ACME crossed 100 at 101',
  'alert: ACME crossed 100 at 105',
];

export class ObserverExample implements PatternExample {
  private ticker?: Subject<Quote>;

  setup(): void {
    this.ticker ??= new Subject<Quote>();
  }

  run(): readonly string[] {
    const ticker = requireSetup(this.ticker, 'Observer');
    const lines: string[] = [];

    const unsubscribeDisplay = ticker.subscribe((q) => lines.push(`display: ${q.symbol} at ${q.price}`));
    const unsubscribeAlert = ticker.subscribe((q) => {
      if (q.price > ALERT_THRESHOLD) {
        lines.push(`alert: ${q.symbol} crossed ${ALERT_THRESHOLD} at ${q.price}`);
      }
    });

    ticker.notify({ symbol: 'ACME', price: 99 });
    ticker.notify({ symbol: 'ACME', price: 101 });
    unsubscribeDisplay();
    ticker.notify({ symbol: 'ACME', price: 105 });
    unsubscribeAlert();

    return lines;
  }

  describe(): ExampleDescription {
    return {
      name: 'Observer',
      intent: 'Notify all dependents automatically when an object changes state',
    };
  }
}
