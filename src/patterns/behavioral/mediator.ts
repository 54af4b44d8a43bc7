/**
 * Mediator: participants talk through a chat room instead of to each other.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';
import { requireSetup } from '../shared.js';

class ChatRoom {
  private readonly members = new Map<string, Participant>();

  join(participant: Participant): void {
    this.members.set(participant.name, participant);
  }

  /**
   * Deliver a message to one member, or to everyone but the sender.
   * Returns one line per delivery.
   */
  deliver(from: string, message: string, to?: string): string[] {
    const recipients = to
      ? [this.members.get(to)].filter((m): m is Participant => m !== undefined)
      : Array.from(this.members.values()).filter((m) => m.name !== from);
    return recipients.map((recipient) => recipient.receive(from, message));
  }
}

class Participant {
  constructor(
    readonly name: string,
    private readonly room: ChatRoom
  ) {
    room.join(this);
  }

  send(message: string, to?: string): string[] {
    return this.room.deliver(this.name, message, to);
  }

  receive(from: string, message: string): string {
    return `${this.name} received "${message}" from ${from}`;
  }
}

export const MEDIATOR_OUTCOME = [
  'bob received "hi all" from alice',
  'carol received "hi all" from alice',
  'carol received "psst" from bob',
];

export class MediatorExample implements PatternExample {
  private members?: Map<string, Participant>;

  setup(): void {
    if (this.members) return;
    const room = new ChatRoom();
    this.members = new Map(
      ['alice', 'bob', 'carol'].map((name): [string, Participant] => [name, new Participant(name, room)])
    );
  }

  run(): readonly string[] {
    const members = requireSetup(this.members, 'Mediator');
    const alice = requireSetup(members.get('alice'), 'Mediator');
    const bob = requireSetup(members.get('bob'), 'Mediator');
    return [...alice.send('hi all'), ...bob.send('psst', 'carol')];
  }

  describe(): ExampleDescription {
    return {
      name: 'Mediator',
      intent: 'Define an object that encapsulates how a set of objects interact',
    };
  }
}
