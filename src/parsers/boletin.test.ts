import { describe, expect, it } from 'vitest';
import { BASE_BOLETIN, avisoHtml, seccionTerceraHtml } from '../testing/boletin-html.js';
import { extraerAvisos, extraerResumenObjeto, parsearAviso } from './boletin.js';
import { cargarHtml } from './lineas.js';

describe('extraerAvisos', () => {
  it('toma solo avisos de la tercera sección, sin repetir', () => {
    const $ = cargarHtml(
      seccionTerceraHtml([
        '/detalleAviso/tercera/100001/20250703',
        '/detalleAviso/tercera/100001/20250703',
        'https://otro.test/detalleAviso/tercera/100002/20250703',
      ])
    );
    expect(extraerAvisos($, '2025-07-03', BASE_BOLETIN)).toEqual([
      {
        titulo_listado: 'Aviso 1',
        url: `${BASE_BOLETIN}/detalleAviso/tercera/100001/20250703`,
        fecha_edicion: '2025-07-03',
      },
      {
        titulo_listado: 'Aviso 3',
        url: 'https://otro.test/detalleAviso/tercera/100002/20250703',
        fecha_edicion: '2025-07-03',
      },
    ]);
  });
});

describe('extraerResumenObjeto', () => {
  it('corta en la primera frase de sección', () => {
    expect(
      extraerResumenObjeto('Expediente 1. Objeto de la contratación: Compra de toner. Retiro del pliego: sede central')
    ).toBe('Compra de toner');
  });

  it('acepta "Asunto"', () => {
    expect(extraerResumenObjeto('Asunto: Servicio de hosting - LUGAR DE CONSULTAS: mesa')).toBe('Servicio de hosting');
  });

  it('sin objeto devuelve null', () => {
    expect(extraerResumenObjeto('Llamado a licitación')).toBeNull();
    expect(extraerResumenObjeto(null)).toBeNull();
  });
});

describe('parsearAviso', () => {
  const url = `${BASE_BOLETIN}/detalleAviso/tercera/100001/20250703`;

  it('lee organismo, proceso, resumen, objeto y fecha', () => {
    const $ = cargarHtml(
      avisoHtml({
        organismo: 'MINISTERIO DE PRUEBAS',
        proceso: 'Licitación Pública 12/2025',
        cuerpo: [
          'Objeto: Adquisición de equipamiento informático para oficinas. Retiro del Pliego: en la sede.',
          'Consultas por correo.',
        ],
        fecha: '03/07/2025',
      })
    );

    expect(parsearAviso($, url)).toEqual({
      organismo: 'MINISTERIO DE PRUEBAS',
      proceso: 'Licitación Pública 12/2025',
      fecha_publicacion: '03/07/2025',
      resumen_proyecto:
        'Objeto: Adquisición de equipamiento informático para oficinas. Retiro del Pliego: en la sede. Consultas por correo.',
      objeto_resumen: 'Adquisición de equipamiento informático para oficinas',
      url,
    });
  });

  it('sin h1 ni h2 no hay organismo ni proceso', () => {
    const detalle = parsearAviso(cargarHtml('<p>Aviso sin títulos</p>'), url);
    expect(detalle.organismo).toBeNull();
    expect(detalle.proceso).toBeNull();
    expect(detalle.resumen_proyecto).toBeNull();
    expect(detalle.fecha_publicacion).toBeNull();
  });
});
