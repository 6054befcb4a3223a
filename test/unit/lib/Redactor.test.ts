import { REDACTED, Redactor } from '../../../lib/Redactor';
import { Device } from '../../../lib/types';

function device(moduleId: string, unitId: string, city?: string): Device {
  return {
    id: `${moduleId}_${unitId}`,
    ref: { moduleId, unitId },
    moduleId,
    unitId,
    moduleName: 'Garden House',
    model: 'AQI',
    firmware: '2.0.4',
    country: 'UK',
    city,
    owner: { firstName: 'Test', lastName: 'Owner' },
    location: { latitude: '51.5', longitude: '-1.25' },
  };
}

describe('Redactor', () => {
  let redactor: Redactor;

  beforeEach(() => {
    redactor = new Redactor();
  });

  describe('redactDevice', () => {
    it('should mask identifying fields and keep the rest', () => {
      const redacted = redactor.redactDevice(device('1234', '1', 'Testville'));

      expect(redacted).toEqual({
        id: '1112_1',
        ref: { moduleId: '1112', unitId: '1' },
        moduleId: '1112',
        unitId: '1',
        moduleName: REDACTED.moduleName,
        model: 'AQI',
        firmware: '2.0.4',
        country: 'UK',
        city: 'Hidden City',
        owner: { firstName: 'First', lastName: 'Last' },
        location: { latitude: '1.1', longitude: '-0.1' },
      });
    });

    it('should give every module a stable pseudonym', () => {
      const ids = [
        device('1234', '1'),
        device('5678', '1'),
        device('5678', '2'),
        device('1234', '1'),
      ].map((entry) => redactor.redactDevice(entry).id);

      expect(ids).toEqual(['1112_1', '1113_1', '1113_2', '1112_1']);
    });

    it('should not invent a city that was never reported', () => {
      expect(redactor.redactDevice(device('1234', '1')).city).toBeUndefined();
    });
  });

  describe('resolve', () => {
    it('should map a pseudonym back to the real module', () => {
      redactor.aliasFor('1234');

      expect(redactor.resolve({ moduleId: '1112', unitId: '1' })).toEqual({
        moduleId: '1234',
        unitId: '1',
      });
    });

    it('should leave unknown refs alone', () => {
      const ref = { moduleId: '1234', unitId: '1' };

      expect(redactor.resolve(ref)).toBe(ref);
    });
  });

  it('should alias the device id of data and register dumps', () => {
    const updatedAt = new Date(1760000000 * 1000);

    const data = redactor.redactDeviceData({
      deviceId: '1234_1',
      updatedAt,
      points: { on: true },
      unmapped: {},
    });
    const dump = redactor.redactRegisters({ deviceId: '1234_1', updatedAt, registers: { '0x10': 215 } });

    expect(data).toEqual({ deviceId: '1112_1', updatedAt, points: { on: true }, unmapped: {} });
    expect(dump).toEqual({ deviceId: '1112_1', updatedAt, registers: { '0x10': 215 } });
  });
});
