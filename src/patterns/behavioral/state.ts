/**
 * State: a traffic light delegates its behaviour to the current state object.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';

type LightColor = 'red' | 'green' | 'yellow';

interface LightState {
  readonly color: LightColor;
  signal(): string;
  next(): LightColor;
}

const STATES: Record<LightColor, LightState> = {
  red: { color: 'red', signal: () => 'stop', next: () => 'green' },
  green: { color: 'green', signal: () => 'go', next: () => 'yellow' },
  yellow: { color: 'yellow', signal: () => 'slow down', next: () => 'red' },
};

class TrafficLight {
  private state: LightState = STATES.red;

  report(): string {
    return `${this.state.color}: ${this.state.signal()}`;
  }

  advance(): void {
    this.state = STATES[this.state.next()];
  }
}

export const STATE_OUTCOME = ['red: stop', 'green: go', 'yellow: slow down', 'red: stop'];

export class StateExample implements PatternExample {
  setup(): void {}

  run(): readonly string[] {
    const light = new TrafficLight();
    const lines: string[] = [];
    for (let i = 0; i < 4; i++) {
      lines.push(light.report());
      light.advance();
    }
    return lines;
  }

  describe(): ExampleDescription {
    return {
      name: 'State',
      intent: 'Let an object alter its behavior when its internal state changes',
    };
  }
}
