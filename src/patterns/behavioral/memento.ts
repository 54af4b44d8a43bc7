/**
 * Memento: document snapshots restored without exposing internals.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';

interface Snapshot {
  readonly content: string;
  readonly cursor: number;
}

class TextDocument {
  private content = '';
  private cursor = 0;

  type(text: string): void {
    this.content = this.content.slice(0, this.cursor) + text + this.content.slice(this.cursor);
    this.cursor += text.length;
  }

  save(): Snapshot {
    return Object.freeze({ content: this.content, cursor: this.cursor });
  }

  restore(snapshot: Snapshot): void {
    this.content = snapshot.content;
    this.cursor = snapshot.cursor;
  }

  toString(): string {
    return `"${this.content}" (cursor ${this.cursor})`;
  }
}

export const MEMENTO_OUTCOME = ['current: "Hello world" (cursor 11)', 'restored: "Hello" (cursor 5)'];

export class MementoExample implements PatternExample {
  setup(): void {}

  run(): readonly string[] {
    const doc = new TextDocument();
    const history: Snapshot[] = [];

    doc.type('Hello');
    history.push(doc.save());
    doc.type(' world');
    const lines = [`current: ${doc.toString()}`];

    const snapshot = history.pop();
    if (snapshot) {
      doc.restore(snapshot);
      lines.push(`restored: ${doc.toString()}`);
    }
    return lines;
  }

  describe(): ExampleDescription {
    return {
      name: 'Memento',
      intent: "Capture an object's internal state so it can be restored later",
    };
  }
}
