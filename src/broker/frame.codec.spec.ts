import { FrameDecodeError } from './broker.errors';
import { decodeFrame, encodeRequest, isRejection } from './frame.codec';

describe('frame codec', () => {
  describe('encodeRequest', () => {
    it('tags the action and correlation id and drops undefined fields', () => {
      const raw = encodeRequest(
        'place_order',
        'req_7_abc',
        { symbol: 'MES', price: undefined, quantity: 2 },
        new Date('2024-03-01T14:30:00.000Z'),
      );

      expect(raw).toBe(
        '{"action":"place_order","request_id":"req_7_abc","symbol":"MES","quantity":2,"timestamp":"2024-03-01T14:30:00.000Z"}',
      );
    });
  });

  describe('decodeFrame', () => {
    it('extracts the tagged fields and keeps the body', () => {
      const frame = decodeFrame(
        '{"type":"market_data","request_id":"req_1_x","data":{"symbol":"MES","bid":5010.5},"seq":9}',
      );

      expect(frame).toEqual({
        type: 'market_data',
        requestId: 'req_1_x',
        status: undefined,
        message: undefined,
        data: { symbol: 'MES', bid: 5010.5 },
        body: { type: 'market_data', request_id: 'req_1_x', data: { symbol: 'MES', bid: 5010.5 }, seq: 9 },
      });
    });

    it('ignores tagged fields of the wrong shape', () => {
      const frame = decodeFrame('{"type":3,"request_id":null,"data":[1,2]}');

      expect(frame.type).toBeUndefined();
      expect(frame.requestId).toBeUndefined();
      expect(frame.data).toBeUndefined();
    });

    it.each(['not json', '[1,2,3]', 'null', '"text"'])('rejects %s', (raw) => {
      expect(() => decodeFrame(raw)).toThrow(FrameDecodeError);
    });
  });

  describe('isRejection', () => {
    it('flags error statuses and error-typed responses', () => {
      expect(isRejection(decodeFrame('{"status":"error"}'))).toBe(true);
      expect(isRejection(decodeFrame('{"status":"rejected"}'))).toBe(true);
      expect(isRejection(decodeFrame('{"type":"error","message":"bad symbol"}'))).toBe(true);
      expect(isRejection(decodeFrame('{"status":"success"}'))).toBe(false);
    });
  });
});
