import { describe, expect, it } from 'vitest';
import { extractAttributes } from '../../src/pipeline/extract/index.js';

const generic = (subject: string, body: string) => extractAttributes(subject, body, 'unknown');

describe('generic extraction', () => {
  it('reads the folio from the subject only', () => {
    expect(generic('Aviso de pago - Folio: 123456789', '')).toEqual({ folio: '123456789' });
    expect(generic('Aviso de pago', 'Folio: 123456789').folio).toBeUndefined();
  });

  it('keeps amounts exactly as written', () => {
    expect(generic('Boleta', 'Total a pagar: $12.013').total_amount).toBe('12.013');
    expect(generic('Boleta', 'Monto total 12.013 CLP').total_amount).toBe('12.013');
    expect(generic('Boleta', 'Su cuenta es de $ 8.500,50 este mes').total_amount).toBe('8.500,50');
  });

  it('prefers the amount after a total label', () => {
    expect(generic('Boleta', 'Cargo fijo $1.200\nTotal a pagar $15.990').total_amount).toBe('15.990');
  });

  it('reads the customer number after its label', () => {
    expect(generic('Boleta', 'Número de cliente: 1234567-8.\n').customer_number).toBe('1234567-8');
  });

  it('takes the first non-empty line after an address label', () => {
    expect(generic('Boleta', 'Dirección de suministro: Av. Los Leones 1200, Providencia\nOtra línea').address).toBe(
      'Av. Los Leones 1200, Providencia',
    );
    expect(generic('Boleta', 'Dirección\n\n  Pasaje Uno 45  \nSantiago').address).toBe('Pasaje Uno 45');
  });

  it('reads due dates in numeric and spelled-out forms', () => {
    expect(generic('Boleta', 'Fecha de vencimiento: 15-02-2026').due_date).toBe('15-02-2026');
    expect(generic('Boleta', 'Fecha de vencimiento: 5 de marzo de 2026').due_date).toBe('5 de marzo de 2026');
  });

  it('takes the first two distinct dates as the billing period', () => {
    const result = generic('Boleta', 'Periodo: 01/01/2026 al 31/01/2026. Vence el 15/02/2026');
    expect(result.billing_period_start).toBe('01/01/2026');
    expect(result.billing_period_end).toBe('31/01/2026');

    const repeated = generic('Boleta', 'Desde 01/01/2026, emitida 01/01/2026, hasta 31/01/2026');
    expect(repeated.billing_period_end).toBe('31/01/2026');
  });

  it('orders dates by pattern before position', () => {
    const result = generic('Boleta', 'Emitida el March 3, 2026. Periodo 01/02/2026 - 28/02/2026');
    expect(result.billing_period_start).toBe('01/02/2026');
    expect(result.billing_period_end).toBe('28/02/2026');
  });

  it('ignores text past the length bound', () => {
    expect(generic('Boleta', `${'x'.repeat(15000)} Total a pagar $999`).total_amount).toBeUndefined();
  });
});
