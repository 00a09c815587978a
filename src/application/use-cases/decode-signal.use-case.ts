import { Inject, Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import { ISignalCodec } from '../../domain/interfaces/services.interface';
import { TradingSignal } from '../../domain/entities/trading-signal.entity';
import { isSignalValidationError } from '../../domain/errors/signal-validation.error';

@Injectable()
export class DecodeSignalUseCase {
  private readonly logger = new Logger(DecodeSignalUseCase.name);

  constructor(
    @Inject('ISignalCodec')
    private readonly codec: ISignalCodec,
  ) {}

  public execute(raw: string): TradingSignal {
    try {
      const signal = this.codec.fromJson(raw);
      this.logger.debug(
        `Decoded signal ${signal.signal_id}: ${signal.side} ${signal.symbol} (${signal.order_type}, ${signal.trade_type})`,
      );
      return signal;
    } catch (error) {
      if (isSignalValidationError(error)) {
        this.logger.warn(`Rejected signal: ${error.message}`, { kind: error.kind, field: error.field });
      } else {
        this.logger.error('Unexpected error while decoding signal:', error);
      }
      throw error;
    }
  }
}
