import { describe, expect, it } from 'vitest';
import { decodeHeaderText, decodeRawHeaderValue } from '../../src/pipeline/normalize/index.js';

describe('decodeHeaderText', () => {
  it('decodes a base64 encoded word', () => {
    const encoded = Buffer.from('Boleta electrónica', 'utf8').toString('base64');
    expect(decodeHeaderText(`=?UTF-8?B?${encoded}?=`)).toBe('Boleta electrónica');
  });

  it('decodes quoted-printable in a legacy charset', () => {
    expect(decodeHeaderText('=?ISO-8859-1?Q?Cuenta_de_agua_=F1and=FA?=')).toBe('Cuenta de agua ñandú');
  });

  it('joins adjacent words before decoding so split characters survive', () => {
    expect(decodeHeaderText('=?utf-8?Q?Factura_electr=C3?= =?utf-8?Q?=B3nica?=')).toBe('Factura electrónica');
  });

  it('keeps plain text around encoded words', () => {
    expect(decodeHeaderText('Aviso =?utf-8?Q?pr=C3=B3ximo?= vencimiento')).toBe('Aviso próximo vencimiento');
  });

  it('falls back to utf-8 for unknown charsets', () => {
    expect(decodeHeaderText('=?x-unknown?Q?caf=C3=A9?=')).toBe('café');
  });

  it('replaces invalid bytes instead of throwing', () => {
    expect(decodeHeaderText('=?utf-8?B?/w==?=')).toBe('�');
  });

  it('unfolds continuation lines', () => {
    expect(decodeHeaderText('Tu boleta\r\n  de gas')).toBe('Tu boleta de gas');
  });
});

describe('decodeRawHeaderValue', () => {
  it('reads undeclared 8-bit utf-8', () => {
    const binary = Buffer.from(' Boleta electrónica', 'utf8').toString('latin1');
    expect(decodeRawHeaderValue(binary)).toBe('Boleta electrónica');
  });

  it('falls back to windows-1252 for bytes that are not utf-8', () => {
    const binary = Buffer.from(' Boleta electrónica', 'latin1').toString('latin1');
    expect(decodeRawHeaderValue(binary)).toBe('Boleta electrónica');
  });

  it('still decodes encoded words', () => {
    expect(decodeRawHeaderValue(' =?ISO-8859-1?Q?Se=F1or?= cliente')).toBe('Señor cliente');
  });
});
