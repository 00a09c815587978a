import { Inject, Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import { DecodeSignalUseCase } from '../../application/use-cases/decode-signal.use-case';
import { ISignalConsumer } from '../../domain/interfaces/services.interface';
import { TradingSignal } from '../../domain/entities/trading-signal.entity';
import {
  SignalValidationError,
  isSignalValidationError,
} from '../../domain/errors/signal-validation.error';

export type SignalIntakeResult =
  | { accepted: true; signal: TradingSignal }
  | { accepted: false; error: SignalValidationError };

/**
 * Entry point for raw messages coming off a transport. Only signals that
 * pass decoding reach the consumer; rejected ones are reported back.
 */
@Injectable()
export class SignalIntakeHandler {
  private readonly logger = new Logger(SignalIntakeHandler.name);

  constructor(
    @Inject(DecodeSignalUseCase)
    private readonly decodeSignalUseCase: DecodeSignalUseCase,
    @Inject('ISignalConsumer')
    private readonly consumer: ISignalConsumer,
  ) {}

  async handleMessage(raw: string): Promise<SignalIntakeResult> {
    let signal: TradingSignal;
    try {
      signal = this.decodeSignalUseCase.execute(raw);
    } catch (error) {
      if (isSignalValidationError(error)) {
        return { accepted: false, error };
      }
      throw error;
    }

    await this.consumer.consume(signal);
    this.logger.info(`Signal ${signal.signal_id} forwarded (${signal.side} ${signal.symbol})`);
    return { accepted: true, signal };
  }
}
