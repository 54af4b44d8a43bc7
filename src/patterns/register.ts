/**
 * Registers the built-in GoF examples.
 * Call once at startup, before anything runs.
 */
import type { ExampleDefinition } from '../core/contract/types.js';
import type { ExampleRegistry } from '../core/registry/example-registry.js';
import { createSeededRandom } from '../utils/random.js';
import { AbstractFactoryExample, ABSTRACT_FACTORY_OUTCOME } from './creational/abstract-factory.js';
import { BuilderExample, BUILDER_OUTCOME } from './creational/builder.js';
import { FactoryMethodExample, FACTORY_METHOD_OUTCOME } from './creational/factory-method.js';
import { PrototypeExample, PROTOTYPE_OUTCOME } from './creational/prototype.js';
import { SingletonExample, SINGLETON_OUTCOME } from './creational/singleton.js';
import { AdapterExample, ADAPTER_OUTCOME } from './structural/adapter.js';
import { BridgeExample, BRIDGE_OUTCOME } from './structural/bridge.js';
import { CompositeExample, COMPOSITE_OUTCOME } from './structural/composite.js';
import { DecoratorExample, DECORATOR_OUTCOME } from './structural/decorator.js';
import { FacadeExample, FACADE_OUTCOME } from './structural/facade.js';
import { FlyweightExample } from './structural/flyweight.js';
import { ProxyExample, PROXY_OUTCOME } from './structural/proxy.js';
import {
  ChainOfResponsibilityExample,
  CHAIN_OF_RESPONSIBILITY_OUTCOME,
} from './behavioral/chain-of-responsibility.js';
import { CommandExample, COMMAND_OUTCOME } from './behavioral/command.js';
import { InterpreterExample, INTERPRETER_OUTCOME } from './behavioral/interpreter.js';
import { IteratorExample, ITERATOR_OUTCOME } from './behavioral/iterator.js';
import { MediatorExample, MEDIATOR_OUTCOME } from './behavioral/mediator.js';
import { MementoExample, MEMENTO_OUTCOME } from './behavioral/memento.js';
import { ObserverExample, OBSERVER_OUTCOME } from './behavioral/observer.js';
import { StateExample, STATE_OUTCOME } from './behavioral/state.js';
import { StrategyExample, STRATEGY_OUTCOME } from './behavioral/strategy.js';
import { TemplateMethodExample, TEMPLATE_METHOD_OUTCOME } from './behavioral/template-method.js';
import { VisitorExample, VISITOR_OUTCOME } from './behavioral/visitor.js';

export interface BuiltInOptions {
  /** Seed for examples that draw random values */
  seed: number;
}

export const DEFAULT_SEED = 42;

/**
 * Built-in definitions in catalogue order.
 * Flyweight declares no expected outcome: its output depends on the seed.
 */
export function builtInExamples(options: BuiltInOptions = { seed: DEFAULT_SEED }): ExampleDefinition[] {
  return [
    { name: 'AbstractFactory', category: 'creational', factory: () => new AbstractFactoryExample(), expectedOutcome: ABSTRACT_FACTORY_OUTCOME },
    { name: 'Builder', category: 'creational', factory: () => new BuilderExample(), expectedOutcome: BUILDER_OUTCOME },
    { name: 'FactoryMethod', category: 'creational', factory: () => new FactoryMethodExample(), expectedOutcome: FACTORY_METHOD_OUTCOME },
    { name: 'Prototype', category: 'creational', factory: () => new PrototypeExample(), expectedOutcome: PROTOTYPE_OUTCOME },
    { name: 'Singleton', category: 'creational', factory: () => new SingletonExample(), expectedOutcome: SINGLETON_OUTCOME },
    { name: 'Adapter', category: 'structural', factory: () => new AdapterExample(), expectedOutcome: ADAPTER_OUTCOME },
    { name: 'Bridge', category: 'structural', factory: () => new BridgeExample(), expectedOutcome: BRIDGE_OUTCOME },
    { name: 'Composite', category: 'structural', factory: () => new CompositeExample(), expectedOutcome: COMPOSITE_OUTCOME },
    { name: 'Decorator', category: 'structural', factory: () => new DecoratorExample(), expectedOutcome: DECORATOR_OUTCOME },
    { name: 'Facade', category: 'structural', factory: () => new FacadeExample(), expectedOutcome: FACADE_OUTCOME },
    { name: 'Flyweight', category: 'structural', factory: () => new FlyweightExample(() => createSeededRandom(options.seed)) },
    { name: 'Proxy', category: 'structural', factory: () => new ProxyExample(), expectedOutcome: PROXY_OUTCOME },
    { name: 'ChainOfResponsibility', category: 'behavioral', factory: () => new ChainOfResponsibilityExample(), expectedOutcome: CHAIN_OF_RESPONSIBILITY_OUTCOME },
    { name: 'Command', category: 'behavioral', factory: () => new CommandExample(), expectedOutcome: COMMAND_OUTCOME },
    { name: 'Interpreter', category: 'behavioral', factory: () => new InterpreterExample(), expectedOutcome: INTERPRETER_OUTCOME },
    { name: 'Iterator', category: 'behavioral', factory: () => new IteratorExample(), expectedOutcome: ITERATOR_OUTCOME },
    { name: 'Mediator', category: 'behavioral', factory: () => new MediatorExample(), expectedOutcome: MEDIATOR_OUTCOME },
    { name: 'Memento', category: 'behavioral', factory: () => new MementoExample(), expectedOutcome: MEMENTO_OUTCOME },
    { name: 'Observer', category: 'behavioral', factory: () => new ObserverExample(), expectedOutcome: OBSERVER_OUTCOME },
    { name: 'State', category: 'behavioral', factory: () => new StateExample(), expectedOutcome: STATE_OUTCOME },
    { name: 'Strategy', category: 'behavioral', factory: () => new StrategyExample(), expectedOutcome: STRATEGY_OUTCOME },
    { name: 'TemplateMethod', category: 'behavioral', factory: () => new TemplateMethodExample(), expectedOutcome: TEMPLATE_METHOD_OUTCOME },
    { name: 'Visitor', category: 'behavioral', factory: () => new VisitorExample(), expectedOutcome: VISITOR_OUTCOME },
  ];
}

export function registerBuiltInExamples(registry: ExampleRegistry, options?: BuiltInOptions): void {
  for (const definition of builtInExamples(options)) {
    registry.register(definition);
  }
}
