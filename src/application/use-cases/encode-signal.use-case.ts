import { Inject, Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import { ISignalCodec } from '../../domain/interfaces/services.interface';
import { TradingSignal } from '../../domain/entities/trading-signal.entity';

@Injectable()
export class EncodeSignalUseCase {
  private readonly logger = new Logger(EncodeSignalUseCase.name);

  constructor(
    @Inject('ISignalCodec')
    private readonly codec: ISignalCodec,
  ) {}

  public execute(signal: TradingSignal): string {
    const json = this.codec.toJson(signal);
    this.logger.debug(`Encoded signal ${signal.signal_id} (${json.length} chars)`);
    return json;
  }
}
