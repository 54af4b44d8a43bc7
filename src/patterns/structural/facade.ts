/**
 * Facade: one home-theater entry point over several subsystems.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';
import { requireSetup } from '../shared.js';

class Amplifier {
  on(): string {
    return 'amplifier on';
  }
  off(): string {
    return 'amplifier off';
  }
}

class Projector {
  on(): string {
    return 'projector on';
  }
  off(): string {
    return 'projector off';
  }
}

class MediaPlayer {
  play(title: string): string {
    return `playing "${title}"`;
  }
  stop(): string {
    return 'player stopped';
  }
}

class HomeTheater {
  constructor(
    private readonly amplifier: Amplifier,
    private readonly projector: Projector,
    private readonly player: MediaPlayer
  ) {}

  watchMovie(title: string): string[] {
    return [this.amplifier.on(), this.projector.on(), this.player.play(title)];
  }

  endMovie(): string[] {
    return [this.player.stop(), this.projector.off(), this.amplifier.off()];
  }
}

export const FACADE_OUTCOME = [
  'amplifier on',
  'projector on',
  'playing "Metropolis"',
  'player stopped',
  'projector off',
  'amplifier off',
];

export class FacadeExample implements PatternExample {
  private theater?: HomeTheater;

  setup(): void {
    this.theater ??= new HomeTheater(new Amplifier(), new Projector(), new MediaPlayer());
  }

  run(): readonly string[] {
    const theater = requireSetup(this.theater, 'Facade');
    return [...theater.watchMovie('Metropolis'), ...theater.endMovie()];
  }

  describe(): ExampleDescription {
    return {
      name: 'Facade',
      intent: 'Provide a unified interface to a set of interfaces in a subsystem',
    };
  }
}
