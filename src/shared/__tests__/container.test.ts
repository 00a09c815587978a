import { DIContainer } from '../container';
import { Inject, Injectable } from '../decorators';
import { registerDependencies } from '../../app.container';
import { SignalIntakeHandler } from '../../presentation/handlers/signal-intake.handler';
import { EncodeSignalUseCase } from '../../application/use-cases/encode-signal.use-case';
import { TradingSignal } from '../../domain/entities/trading-signal.entity';
import { exampleMap, limitProps } from '../../__tests__/fixtures';

@Injectable()
class Clock {
  now(): number {
    return 42;
  }
}

@Injectable()
class Greeter {
  constructor(
    @Inject('greeting') readonly greeting: string,
    @Inject(Clock) readonly clock: Clock,
  ) {}
}

describe('DIContainer', () => {
  let container: DIContainer;

  beforeEach(() => {
    container = new DIContainer();
  });

  it('resolves injected parameters in constructor order', () => {
    container.bind('greeting', () => 'hello');

    const greeter = container.get(Greeter);

    expect(greeter.greeting).toBe('hello');
    expect(greeter.clock.now()).toBe(42);
  });

  it('caches singletons and rebuilds transient bindings', () => {
    container.bind('singleton', () => ({ id: 1 }));
    container.bind('transient', () => ({ id: 2 }), false);

    expect(container.get('singleton')).toBe(container.get('singleton'));
    expect(container.get('transient')).not.toBe(container.get('transient'));
  });

  it('throws for unknown tokens', () => {
    expect(() => container.get('ISignalCodec')).toThrow('No binding found for token: ISignalCodec');
  });

  it('unbinds and clears bindings', () => {
    container.bind('a', () => 1);
    container.bind('b', () => 2);

    container.unbind('a');
    expect(container.has('a')).toBe(false);
    expect(container.has('b')).toBe(true);

    container.clear();
    expect(container.has('b')).toBe(false);
  });

  describe('registerDependencies', () => {
    it('wires the intake handler to the given consumer', async () => {
      const received: TradingSignal[] = [];
      registerDependencies(
        {
          consume: async (signal) => {
            received.push(signal);
          },
        },
        container,
      );

      const result = await container.get(SignalIntakeHandler).handleMessage(JSON.stringify(exampleMap()));

      expect(result.accepted).toBe(true);
      expect(received).toHaveLength(1);
      expect(container.get(SignalIntakeHandler)).toBe(container.get(SignalIntakeHandler));
    });

    it('registers the encode use case', () => {
      registerDependencies({ consume: async () => undefined }, container);

      const json = container.get(EncodeSignalUseCase).execute(TradingSignal.create(limitProps()));

      expect(JSON.parse(json).symbol).toBe('ETH-USDT');
    });
  });
});
