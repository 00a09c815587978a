import { SignalIntakeHandler } from '../signal-intake.handler';
import { DecodeSignalUseCase } from '../../../application/use-cases/decode-signal.use-case';
import { SignalJsonCodec } from '../../../infrastructure/codec/signal-json.codec';
import { TradingSignal } from '../../../domain/entities/trading-signal.entity';
import { SIGNAL_ID, exampleMap } from '../../../__tests__/fixtures';

describe('SignalIntakeHandler', () => {
  const consume = jest.fn<Promise<void>, [TradingSignal]>();
  const handler = new SignalIntakeHandler(new DecodeSignalUseCase(new SignalJsonCodec()), { consume });

  beforeEach(() => {
    consume.mockReset();
    consume.mockResolvedValue(undefined);
  });

  it('forwards valid signals to the consumer', async () => {
    const result = await handler.handleMessage(JSON.stringify(exampleMap()));

    expect(result.accepted).toBe(true);
    expect(consume).toHaveBeenCalledTimes(1);
    expect(consume.mock.calls[0][0].signal_id).toBe(SIGNAL_ID);
  });

  it('reports rejected signals without forwarding them', async () => {
    const result = await handler.handleMessage(JSON.stringify({ ...exampleMap(), order_type: 'BOGUS' }));

    expect(consume).not.toHaveBeenCalled();
    expect(result.accepted).toBe(false);
    if (!result.accepted) {
      expect(result.error.kind).toBe('UnknownEnumValue');
      expect(result.error.field).toBe('order_type');
    }
  });

  it('reports malformed messages', async () => {
    const result = await handler.handleMessage('not json');

    expect(result.accepted).toBe(false);
    if (!result.accepted) {
      expect(result.error.kind).toBe('MalformedInterchange');
    }
  });

  it('propagates consumer failures', async () => {
    consume.mockRejectedValue(new Error('queue unavailable'));

    await expect(handler.handleMessage(JSON.stringify(exampleMap()))).rejects.toThrow('queue unavailable');
  });
});
