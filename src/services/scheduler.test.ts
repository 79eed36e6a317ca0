import { describe, expect, it } from 'vitest';
import type { AdapterFuente, OpcionesAdapter } from '../adapters/pipeline.js';
import { Programador, rangoProgramado } from './scheduler.js';
import type { OpcionesProgramador } from './scheduler.js';

const OPCIONES: OpcionesProgramador = {
  fuente: 'falsa',
  cron: '0 7 * * *',
  dias: 3,
  carpetaSalida: 'salida',
};

describe('rangoProgramado', () => {
  it('cubre los últimos N días terminando hoy', () => {
    const hoy = new Date(2025, 6, 10);
    expect(rangoProgramado(hoy, 7)).toEqual({ desde: new Date(2025, 6, 4), hasta: hoy });
    expect(rangoProgramado(hoy, 1)).toEqual({ desde: hoy, hasta: hoy });
    expect(rangoProgramado(hoy, 0)).toEqual({ desde: hoy, hasta: hoy });
  });
});

describe('Programador', () => {
  it('rechaza expresiones cron inválidas', () => {
    const adapter: AdapterFuente = async () => 0;
    expect(() => new Programador({ ...OPCIONES, cron: 'cada hora' }, () => adapter)).toThrow(
      'Expresión cron inválida: cada hora'
    );
  });

  it('rechaza fuentes desconocidas', () => {
    expect(() => new Programador({ ...OPCIONES, fuente: 'otra' })).toThrow('Fuente desconocida: otra');
  });

  it('corre el adapter con el rango calculado', async () => {
    const llamadas: Array<[Date, Date, string, OpcionesAdapter | undefined]> = [];
    const adapter: AdapterFuente = async (desde, hasta, carpeta, opciones) => {
      llamadas.push([desde, hasta, carpeta, opciones]);
      return 4;
    };
    const programador = new Programador(OPCIONES, () => adapter);

    const cantidad = await programador.ejecutarCiclo(new Date(2025, 6, 10));

    expect(cantidad).toBe(4);
    expect(llamadas).toEqual([[new Date(2025, 6, 8), new Date(2025, 6, 10), 'salida', { config: undefined }]]);
  });

  it('saltea el ciclo si el anterior sigue corriendo', async () => {
    let liberar: (cantidad: number) => void = () => undefined;
    const adapter: AdapterFuente = () =>
      new Promise<number>((resolve) => {
        liberar = resolve;
      });
    const programador = new Programador(OPCIONES, () => adapter);

    const primero = programador.ejecutarCiclo(new Date(2025, 6, 10));
    expect(programador.ocupado).toBe(true);
    expect(await programador.ejecutarCiclo(new Date(2025, 6, 10))).toBeNull();

    liberar(1);
    expect(await primero).toBe(1);
    expect(programador.ocupado).toBe(false);
  });

  it('un ciclo con error devuelve 0 y libera el guard', async () => {
    const adapter: AdapterFuente = async () => {
      throw new Error('timeout');
    };
    const programador = new Programador(OPCIONES, () => adapter);

    expect(await programador.ejecutarCiclo(new Date(2025, 6, 10))).toBe(0);
    expect(programador.ocupado).toBe(false);
  });
});
