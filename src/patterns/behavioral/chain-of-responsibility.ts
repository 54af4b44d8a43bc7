/**
 * Chain of Responsibility: support tickets escalate until someone accepts them.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';
import { requireSetup } from '../shared.js';

type Severity = 'low' | 'medium' | 'high' | 'critical';

interface Ticket {
  id: number;
  severity: Severity;
}

class SupportHandler {
  private next?: SupportHandler;

  constructor(
    readonly name: string,
    private readonly accepts: Severity
  ) {}

  /** Returns the handler passed in, so chains read left to right. */
  setNext(next: SupportHandler): SupportHandler {
    this.next = next;
    return next;
  }

  handle(ticket: Ticket): string {
    if (ticket.severity === this.accepts) {
      return `ticket ${ticket.id} (${ticket.severity}) handled by ${this.name}`;
    }
    if (this.next) {
      return this.next.handle(ticket);
    }
    return `ticket ${ticket.id} (${ticket.severity}) was not handled`;
  }
}

export const CHAIN_OF_RESPONSIBILITY_OUTCOME = [
  'ticket 1 (low) handled by front desk',
  'ticket 2 (high) handled by manager',
  'ticket 3 (critical) was not handled',
];

export class ChainOfResponsibilityExample implements PatternExample {
  private chain?: SupportHandler;

  setup(): void {
    if (this.chain) return;
    const frontDesk = new SupportHandler('front desk', 'low');
    frontDesk
      .setNext(new SupportHandler('engineer', 'medium'))
      .setNext(new SupportHandler('manager', 'high'));
    this.chain = frontDesk;
  }

  run(): readonly string[] {
    const chain = requireSetup(this.chain, 'ChainOfResponsibility');
    const tickets: Ticket[] = [
      { id: 1, severity: 'low' },
      { id: 2, severity: 'high' },
      { id: 3, severity: 'critical' },
    ];
    return tickets.map((ticket) => chain.handle(ticket));
  }

  describe(): ExampleDescription {
    return {
      name: 'ChainOfResponsibility',
      intent: 'Pass a request along a chain of handlers until one of them handles it',
    };
  }
}
