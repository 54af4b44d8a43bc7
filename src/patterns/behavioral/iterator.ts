/**
 * Iterator: a playlist traversed forwards and backwards without exposing its storage.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';

class PlaylistIterator implements Iterator<string> {
  private index: number;

  constructor(
    private readonly songs: readonly string[],
    private readonly step: 1 | -1
  ) {
    this.index = step === 1 ? 0 : songs.length - 1;
  }

  next(): IteratorResult<string> {
    if (this.index < 0 || this.index >= this.songs.length) {
      return { done: true, value: undefined };
    }
    const value = this.songs[this.index];
    this.index += this.step;
    return { done: false, value };
  }
}

class Playlist implements Iterable<string> {
  private readonly songs: string[] = [];

  add(song: string): void {
    this.songs.push(song);
  }

  get length(): number {
    return this.songs.length;
  }

  [Symbol.iterator](): Iterator<string> {
    return new PlaylistIterator(this.songs, 1);
  }

  reversed(): Iterable<string> {
    return { [Symbol.iterator]: () => new PlaylistIterator(this.songs, -1) };
  }
}

export const ITERATOR_OUTCOME = ['forward: Intro, Verse, Outro', 'reverse: Outro, Verse, Intro'];

export class IteratorExample implements PatternExample {
  private readonly playlist = new Playlist();

  setup(): void {
    if (this.playlist.length > 0) return;
    for (const song of ['Intro', 'Verse', 'Outro']) {
      this.playlist.add(song);
    }
  }

  run(): readonly string[] {
    return [
      `forward: ${Array.from(this.playlist).join(', ')}`,
      `reverse: ${Array.from(this.playlist.reversed()).join(', ')}`,
    ];
  }

  describe(): ExampleDescription {
    return {
      name: 'Iterator',
      intent: 'Access the elements of an aggregate sequentially without exposing its representation',
    };
  }
}
