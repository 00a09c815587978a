import { TradingSignalDto } from '../../application/dto/trading-signal.dto';
import { TradingSignal, TradingSignalDict } from '../../domain/entities/trading-signal.entity';
import { SignalValidationError } from '../../domain/errors/signal-validation.error';
import { ISignalCodec } from '../../domain/interfaces/services.interface';
import { Injectable } from '../../shared/decorators';

/**
 * JSON interchange codec. Decimals travel as JSON strings in both
 * directions; numbers are accepted on decode but never produced.
 */
@Injectable()
export class SignalJsonCodec implements ISignalCodec {
  public toDict(signal: TradingSignal): TradingSignalDict {
    return signal.toDict();
  }

  public fromDict(data: unknown): TradingSignal {
    if (!isPlainMap(data)) {
      throw SignalValidationError.malformed(`expected an object at the top level, got ${describe(data)}`);
    }

    const dto = TradingSignalDto.fromMap(data);
    dto.validate();
    return TradingSignal.fromInput(dto.toInput());
  }

  public toJson(signal: TradingSignal): string {
    return JSON.stringify(this.toDict(signal));
  }

  public fromJson(json: string): TradingSignal {
    let data: unknown;
    try {
      data = JSON.parse(json);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw SignalValidationError.malformed(`invalid JSON (${reason})`);
    }
    return this.fromDict(data);
  }
}

function isPlainMap(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}
