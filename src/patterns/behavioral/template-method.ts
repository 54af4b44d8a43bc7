/**
 * Template Method: a fixed report skeleton with pluggable steps.
 * Steps are supplied as an object rather than by subclassing.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';

interface Score {
  name: string;
  score: number;
}

interface ReportSteps {
  header(): string;
  row(entry: Score): string;
  /** Optional hook; the skeleton supplies a default footer. */
  footer?(entries: readonly Score[]): string;
}

function renderReport(steps: ReportSteps, entries: readonly Score[]): string[] {
  return [
    steps.header(),
    ...entries.map((entry) => steps.row(entry)),
    steps.footer ? steps.footer(entries) : 'end of report',
  ];
}

const csvReport: ReportSteps = {
  header: () => 'name,score',
  row: ({ name, score }) => `${name},${score}`,
};

const textReport: ReportSteps = {
  header: () => 'SCORES',
  row: ({ name, score }) => `${name}: ${score}`,
  footer: (entries) => `${entries.length} entries`,
};

const SCORES: readonly Score[] = [
  { name: 'ada', score: 3 },
  { name: 'linus', score: 5 },
];

export const TEMPLATE_METHOD_OUTCOME = [
  'name,score',
  'ada,3',
  'linus,5',
  'end of report',
  'SCORES',
  'ada: 3',
  'linus: 5',
  '2 entries',
];

export class TemplateMethodExample implements PatternExample {
  setup(): void {}

  run(): readonly string[] {
    return [...renderReport(csvReport, SCORES), ...renderReport(textReport, SCORES)];
  }

  describe(): ExampleDescription {
    return {
      name: 'TemplateMethod',
      intent: 'Define the skeleton of an algorithm and defer some steps to pluggable parts',
    };
  }
}
