import { Command, InvalidCommandError, Packet, Priority } from '@ramses-link/serial';

const DTM = new Date('2026-03-01T12:00:00Z');

describe('Packet.parse', () => {
  test('parses a broadcast frame', () => {
    const pkt = Packet.parse('045  I --- 01:145038 --:------ 01:145038 1F09 003 FF04B5', DTM);

    expect(pkt).toBeDefined();
    expect(pkt?.rssi).toBe('045');
    expect(pkt?.verb).toBe(' I');
    expect(pkt?.src).toBe('01:145038');
    expect(pkt?.dst).toBe('01:145038');
    expect(pkt?.code).toBe('1F09');
    expect(pkt?.payload).toBe('FF04B5');
    expect(pkt?.header).toBe('1F09| I|01:145038');
    expect(pkt?.dtm).toBe(DTM);
    expect(String(pkt)).toBe('045  I --- 01:145038 --:------ 01:145038 1F09 003 FF04B5');
  });

  test('a reply carries its source and zone index in the header', () => {
    const pkt = Packet.parse('062 RP --- 01:123456 18:000730 --:------ 3220 005 00C0050000', DTM);
    expect(pkt?.header).toBe('3220|RP|01:123456|00');
  });

  test('a request is keyed on its destination', () => {
    const pkt = Packet.parse('000 RQ --- 18:000730 01:123456 --:------ 3220 005 0000050000', DTM);
    expect(pkt?.header).toBe('3220|RQ|01:123456|00');
  });

  test.each([
    ['garbage', 'not a packet'],
    ['length mismatch', '045  I --- 01:145038 --:------ 01:145038 1F09 004 FF04B5'],
    ['lower-case payload', '045  I --- 01:145038 --:------ 01:145038 1F09 003 ff04b5'],
    ['unknown verb', '045 XX --- 01:145038 --:------ 01:145038 1F09 003 FF04B5'],
    ['no source', '045  I --- --:------ --:------ 01:145038 1F09 003 FF04B5'],
    ['empty payload', '045  I --- 01:145038 --:------ 01:145038 1F09 000 '],
  ])('rejects %s', (_label, line) => {
    expect(Packet.parse(line, DTM)).toBeUndefined();
  });
});

describe('Command', () => {
  test('frames a request and derives both headers', () => {
    const cmd = new Command({ verb: 'RQ', dest: '01:123456', code: '3220', payload: '0000050000' });

    expect(String(cmd)).toBe('RQ --- 18:000730 01:123456 --:------ 3220 005 0000050000');
    expect(cmd.header).toBe('3220|RQ|01:123456|00');
    expect(cmd.rxHeader).toBe('3220|RP|01:123456|00');
    expect(cmd.priority).toBe(Priority.DEFAULT);
  });

  test('the reply to a request matches its rxHeader', () => {
    const cmd = Command.fromString('RQ 01:123456 1F09 00');
    const reply = Packet.parse('055 RP --- 01:123456 18:000730 --:------ 1F09 003 FF04B5', DTM);
    expect(reply?.header).toBe(cmd.rxHeader);
  });

  test('the gateway echo of a command matches its header', () => {
    const cmd = Command.fromString('RQ 01:123456 1F09 00');
    const echo = Packet.parse(`000 ${String(cmd)}`, DTM);
    expect(echo?.header).toBe(cmd.header);
  });

  test('a write expects an I in reply', () => {
    const cmd = Command.fromString('W 01:123456 2309 0107D0', Priority.HIGH);

    expect(cmd.verb).toBe(' W');
    expect(cmd.priority).toBe(2);
    expect(cmd.rxHeader).toBe('2309| I|01:123456|01');
    expect(String(cmd)).toBe(' W --- 18:000730 01:123456 --:------ 2309 003 0107D0');
  });

  test('upper-cases code and payload', () => {
    const cmd = new Command({ verb: 'RQ', dest: '01:123456', code: '1f09', payload: 'ff' });
    expect(String(cmd)).toBe('RQ --- 18:000730 01:123456 --:------ 1F09 001 FF');
  });

  test.each([
    ['RQ 01:123456 1F09'],
    ['XX 01:123456 1F09 00'],
    ['RQ 1:123456 1F09 00'],
    ['RQ 01:123456 1F0 00'],
    ['RQ 01:123456 1F09 0'],
  ])('rejects "%s"', (input) => {
    expect(() => Command.fromString(input)).toThrow(InvalidCommandError);
  });
});
