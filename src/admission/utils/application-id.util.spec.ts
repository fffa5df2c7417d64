import { formatApplicationId, temporaryPasswordFor } from './application-id.util';

describe('application id', () => {
  it('pads the serial to six digits', () => {
    expect(formatApplicationId(2025, 1)).toBe('ADM2025000001');
    expect(formatApplicationId(2026, 123456)).toBe('ADM2026123456');
  });

  it('derives the temporary password from the last four characters', () => {
    expect(temporaryPasswordFor('ADM2025000042')).toBe('temp0042');
  });
});
