/**
 * Abstract Factory: themed widget families created through one factory interface.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';

interface Widget {
  render(): string;
}

interface WidgetFactory {
  createButton(): Widget;
  createCheckbox(): Widget;
}

function themedFactory(theme: string): WidgetFactory {
  return {
    createButton: () => ({ render: () => `${theme} button` }),
    createCheckbox: () => ({ render: () => `${theme} checkbox` }),
  };
}

function renderForm(factory: WidgetFactory): string {
  return `${factory.createButton().render()} + ${factory.createCheckbox().render()}`;
}

export const ABSTRACT_FACTORY_OUTCOME = [
  'light theme: light button + light checkbox',
  'dark theme: dark button + dark checkbox',
];

export class AbstractFactoryExample implements PatternExample {
  private readonly factories = new Map<string, WidgetFactory>();

  setup(): void {
    for (const theme of ['light', 'dark']) {
      if (!this.factories.has(theme)) {
        this.factories.set(theme, themedFactory(theme));
      }
    }
  }

  run(): readonly string[] {
    return Array.from(this.factories, ([theme, factory]) => `${theme} theme: ${renderForm(factory)}`);
  }

  describe(): ExampleDescription {
    return {
      name: 'AbstractFactory',
      intent: 'Create families of related objects without naming their concrete classes',
    };
  }
}
