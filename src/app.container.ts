import { DIContainer } from './shared/container';
import { Logger } from './shared/logger';
import { SignalJsonCodec } from './infrastructure/codec/signal-json.codec';
import { DecodeSignalUseCase } from './application/use-cases/decode-signal.use-case';
import { EncodeSignalUseCase } from './application/use-cases/encode-signal.use-case';
import { SignalIntakeHandler } from './presentation/handlers/signal-intake.handler';
import { ISignalCodec, ISignalConsumer } from './domain/interfaces/services.interface';

const logger = new Logger('DependencyContainer');

export function registerDependencies(
  consumer: ISignalConsumer,
  container: DIContainer = DIContainer.getInstance(),
): void {
  // --- Register Codec ---
  container.bind<ISignalCodec>('ISignalCodec', () => new SignalJsonCodec());

  // --- Register Use Cases ---
  container.bind(
    DecodeSignalUseCase,
    () => new DecodeSignalUseCase(container.get<ISignalCodec>('ISignalCodec')),
  );
  container.bind(
    EncodeSignalUseCase,
    () => new EncodeSignalUseCase(container.get<ISignalCodec>('ISignalCodec')),
  );

  // --- Register Consumer & Handlers ---
  container.bind<ISignalConsumer>('ISignalConsumer', () => consumer);
  container.bindClass(SignalIntakeHandler, SignalIntakeHandler);

  logger.info('Dependencies registered');
}
