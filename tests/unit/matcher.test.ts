import { describe, expect, it } from 'vitest';
import { matchService } from '../../src/pipeline/match/matcher.js';

const aguas = {
  serviceId: 'aguas_andinas',
  serviceName: 'Aguas Andinas',
  sampleFrom: 'Aguas Andinas <boletas@aguasandinas.cl>',
};

describe('matchService', () => {
  it('matches on the sample sender domain alone', () => {
    expect(matchService(aguas, { from: 'cobranza@aguasandinas.cl', subject: 'Aviso', body: '' })).toBe(
      'sender_domain',
    );
  });

  it('matches when every significant name word appears', () => {
    const service = { serviceId: 'zz_top', serviceName: 'Servicios Sanitarios', sampleFrom: 'x@otro.cl' };
    expect(matchService(service, { from: 'no-reply@mail.cl', subject: 'Servicios sanitarios informa', body: '' })).toBe(
      'name_words',
    );
  });

  it('matches the service id with underscores as gaps', () => {
    const service = { serviceId: 'luz_norte', serviceName: 'LN', sampleFrom: '' };
    expect(matchService(service, { from: 'x@y.cl', subject: 'Boleta Luz del Norte', body: '' })).toBe('service_id');
  });

  it('never matches on a name without significant words', () => {
    const service = { serviceId: 'gas', serviceName: 'Gas', sampleFrom: '' };
    expect(matchService(service, { from: 'a@b.cl', subject: 'Hola', body: 'Nada' })).toBeNull();
  });

  it('returns null when no criterion holds', () => {
    expect(matchService(aguas, { from: 'news@tienda.com', subject: 'Ofertas', body: 'Descuentos' })).toBeNull();
  });
});
