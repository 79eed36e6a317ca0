import { describe, expect, it } from 'vitest';
import { scrapeBoletinTercera } from './boletin-tercera.js';
import { scrapeComprarTicsRobot } from './comprar.js';
import { CLAVES_FUENTES, esClaveFuente, obtenerAdapter } from './registry.js';

describe('registro de fuentes', () => {
  it('expone las tres claves', () => {
    expect(CLAVES_FUENTES).toEqual(['boletin_tercera', 'comprar_tics', 'comprar_tics_robot']);
    expect(esClaveFuente('comprar_tics')).toBe(true);
    expect(esClaveFuente('comprar')).toBe(false);
  });

  it('resuelve cada clave a su adapter', () => {
    expect(obtenerAdapter('boletin_tercera')).toBe(scrapeBoletinTercera);
    expect(obtenerAdapter('comprar_tics_robot')).toBe(scrapeComprarTicsRobot);
  });

  it('una clave desconocida falla con la lista de válidas', () => {
    expect(() => obtenerAdapter('bora')).toThrow(
      'Fuente desconocida: bora. Claves válidas: boletin_tercera, comprar_tics, comprar_tics_robot'
    );
  });
});
