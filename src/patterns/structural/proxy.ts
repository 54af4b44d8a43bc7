/**
 * Proxy: an image is only loaded from disk on first display.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';

interface Image {
  display(): string;
}

class DiskImage implements Image {
  constructor(
    private readonly file: string,
    log: string[]
  ) {
    log.push(`loading ${file} from disk`);
  }

  display(): string {
    return `displaying ${this.file}`;
  }
}

class LazyImage implements Image {
  private real?: DiskImage;

  constructor(
    private readonly file: string,
    private readonly log: string[]
  ) {}

  display(): string {
    this.real ??= new DiskImage(this.file, this.log);
    return this.real.display();
  }
}

export const PROXY_OUTCOME = [
  'proxy created',
  'loading photo.png from disk',
  'displaying photo.png',
  'displaying photo.png',
];

export class ProxyExample implements PatternExample {
  setup(): void {}

  run(): readonly string[] {
    const log: string[] = [];
    const image = new LazyImage('photo.png', log);
    log.push('proxy created');
    log.push(image.display());
    log.push(image.display());
    return log;
  }

  describe(): ExampleDescription {
    return {
      name: 'Proxy',
      intent: 'Provide a placeholder for another object to control access to it',
    };
  }
}
