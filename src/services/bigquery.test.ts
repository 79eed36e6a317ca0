import { describe, expect, it } from 'vitest';
import type { ProcesoCompra } from '../types/index.js';
import { aModeloTics, prepararFila, verificarCredenciales } from './bigquery.js';

const FECHA_CARGA = new Date('2025-07-10T12:00:00.000Z');

describe('prepararFila', () => {
  it('arma la fila con doc_id saneado y año derivado', () => {
    const fila = prepararFila(
      {
        numero_proceso: '14/1-0026 LPR25',
        nombre_proceso: 'Servidores',
        fecha_apertura: '18/07/2025 10:30 Hrs.',
        detalle_productos_servicios: 'Renglón 1',
        origen: 'COMPRAR',
        es_tic: true,
      },
      'numero_proceso',
      FECHA_CARGA
    );

    expect(fila).toEqual({
      doc_id: '14-1-0026_LPR25',
      n: null,
      numero_proceso: '14/1-0026 LPR25',
      expediente: null,
      nombre_proceso: 'Servidores',
      tipo_proceso: null,
      fecha_apertura: '18/07/2025 10:30 Hrs.',
      estado: null,
      unidad_ejecutora: null,
      saf: null,
      detalle_productos_servicios: 'Renglón 1',
      pliego_numero: null,
      link: null,
      origen: 'COMPRAR',
      es_tic: true,
      anio: 2025,
      fecha_carga: '2025-07-10T12:00:00.000Z',
    });
  });

  it('respeta el año dado y el campo de ID elegido', () => {
    const fila = prepararFila({ expediente: 'EX 2024/9', anio: 2023, fecha_apertura: '2025' }, 'expediente', FECHA_CARGA);
    expect(fila.doc_id).toBe('EX_2024-9');
    expect(fila.anio).toBe(2023);
  });

  it('sin ID queda doc_id null', () => {
    expect(prepararFila({ numero_proceso: '' }, 'numero_proceso', FECHA_CARGA).doc_id).toBeNull();
    expect(prepararFila({}, 'numero_proceso', FECHA_CARGA).doc_id).toBeNull();
  });
});

describe('aModeloTics', () => {
  it('renombra al modelo procesos_tics', () => {
    const registro: ProcesoCompra = {
      numero_proceso: '40-0001-LPU25',
      expediente: null,
      nombre_proceso: 'Mobiliario',
      tipo_proceso: null,
      fecha_apertura: '18/07/2025',
      estado: null,
      unidad_ejecutora: null,
      saf: null,
      detalle_productos: 'Sillas',
      pliego_nombre: 'PLIEG-2025-1-APN',
      pliego_url: 'https://comprar.test/pliego',
      url_detalle: null,
      origen: 'COMPRAR',
      es_tic: false,
      anio: 2025,
    };
    expect(aModeloTics(registro)).toMatchObject({
      n: null,
      detalle_productos_servicios: 'Sillas',
      pliego_numero: 'PLIEG-2025-1-APN',
      link: 'https://comprar.test/pliego',
      es_tic: false,
      anio: 2025,
    });
  });
});

describe('verificarCredenciales', () => {
  it('falla si el archivo no existe', () => {
    expect(() => verificarCredenciales('/no/existe/sa-key.json')).toThrow(
      'No se encontró el archivo de credenciales: /no/existe/sa-key.json'
    );
    expect(() => verificarCredenciales(undefined)).not.toThrow();
  });
});
