import { describe, expect, it } from 'vitest';
import { extractAttributes } from '../../src/pipeline/extract/index.js';

describe('gas extraction', () => {
  it('reads a total without currency symbol, labelled consumption and points', () => {
    const body = [
      'Total a pagar 12.013',
      'Consumo del período: 35 m3',
      'Metropuntos acumulados: 1.250',
      'Disfruta 2 m3 de regalo',
    ].join('\n');

    expect(extractAttributes('Metrogas - Boleta', body, 'gas')).toEqual({
      total_amount: '12.013',
      consumption_m3: '35',
      metropuntos: '1.250',
    });
  });

  it('does not take a bare m3 value as consumption', () => {
    expect(extractAttributes('Metrogas', 'Ahorra hasta 10 m3 con nuestros consejos', 'gas').consumption_m3).toBeUndefined();
  });

  it('skips dates inside the total window', () => {
    expect(extractAttributes('Metrogas', 'Total a pagar hasta el 05/02/2026: 9.990', 'gas').total_amount).toBe('9.990');
  });
});
