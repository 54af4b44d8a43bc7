/**
 * Bridge: shapes and renderers vary independently.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';

interface Renderer {
  drawCircle(radius: number): string;
}

const vectorRenderer: Renderer = {
  drawCircle: (radius) => `vector circle of radius ${radius}`,
};

const rasterRenderer: Renderer = {
  drawCircle: (radius) => `raster circle ${radius * 2} pixels wide`,
};

class Circle {
  constructor(
    private readonly renderer: Renderer,
    private radius: number
  ) {}

  resize(factor: number): void {
    this.radius *= factor;
  }

  draw(): string {
    return this.renderer.drawCircle(this.radius);
  }
}

export const BRIDGE_OUTCOME = ['vector circle of radius 5', 'raster circle 20 pixels wide'];

export class BridgeExample implements PatternExample {
  setup(): void {}

  run(): readonly string[] {
    const vector = new Circle(vectorRenderer, 5);
    const raster = new Circle(rasterRenderer, 5);
    raster.resize(2);
    return [vector.draw(), raster.draw()];
  }

  describe(): ExampleDescription {
    return {
      name: 'Bridge',
      intent: 'Decouple an abstraction from its implementation so the two can vary independently',
    };
  }
}
