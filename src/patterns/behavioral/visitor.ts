/**
 * Visitor over a closed set of shape tags.
 * Dispatch goes through visit(tag, payload) instead of runtime type checks.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';

interface ShapePayloads {
  circle: { radius: number };
  rectangle: { width: number; height: number };
  triangle: { base: number; height: number };
}

type ShapeTag = keyof ShapePayloads;

type Shape = { [K in ShapeTag]: { tag: K; payload: ShapePayloads[K] } }[ShapeTag];

type ShapeVisitor<R> = { [K in ShapeTag]: (payload: ShapePayloads[K]) => R };

export function visit<R, K extends ShapeTag>(
  visitor: ShapeVisitor<R>,
  tag: K,
  payload: ShapePayloads[K]
): R {
  const handler: ShapeVisitor<R>[K] = visitor[tag];
  return handler(payload);
}

const areaVisitor: ShapeVisitor<number> = {
  circle: ({ radius }) => Math.PI * radius * radius,
  rectangle: ({ width, height }) => width * height,
  triangle: ({ base, height }) => (base * height) / 2,
};

const labelVisitor: ShapeVisitor<string> = {
  circle: ({ radius }) => `circle r=${radius}`,
  rectangle: ({ width, height }) => `rectangle ${width}x${height}`,
  triangle: ({ base, height }) => `triangle b=${base} h=${height}`,
};

export const VISITOR_OUTCOME = [
  'circle r=1: area 3.14',
  'rectangle 3x4: area 12.00',
  'triangle b=6 h=2: area 6.00',
];

export class VisitorExample implements PatternExample {
  private shapes: Shape[] = [];

  setup(): void {
    this.shapes = [
      { tag: 'circle', payload: { radius: 1 } },
      { tag: 'rectangle', payload: { width: 3, height: 4 } },
      { tag: 'triangle', payload: { base: 6, height: 2 } },
    ];
  }

  run(): readonly string[] {
    return this.shapes.map((shape) => {
      const label = visit(labelVisitor, shape.tag, shape.payload);
      const area = visit(areaVisitor, shape.tag, shape.payload);
      return `${label}: area ${area.toFixed(2)}`;
    });
  }

  describe(): ExampleDescription {
    return {
      name: 'Visitor',
      intent: 'Add operations over a fixed set of element types without changing them',
    };
  }
}
