import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { cargarRegistros } from './subir.js';

describe('cargarRegistros', () => {
  let carpeta: string;

  beforeEach(() => {
    carpeta = mkdtempSync(join(tmpdir(), 'subir-test-'));
  });

  afterEach(() => {
    rmSync(carpeta, { recursive: true, force: true });
  });

  it('lee la lista de registros', () => {
    const ruta = join(carpeta, 'procesos.json');
    writeFileSync(ruta, JSON.stringify([{ numero_proceso: '40-1' }]), 'utf-8');
    expect(cargarRegistros(ruta)).toEqual([{ numero_proceso: '40-1' }]);
  });

  it('falla con archivo inexistente, vacío o mal formado', () => {
    const inexistente = join(carpeta, 'no.json');
    expect(() => cargarRegistros(inexistente)).toThrow(`No se encontró el archivo JSON: ${inexistente}`);

    const vacio = join(carpeta, 'vacio.json');
    writeFileSync(vacio, '[]', 'utf-8');
    expect(() => cargarRegistros(vacio)).toThrow(`El archivo JSON no tiene registros: ${vacio}`);

    const objeto = join(carpeta, 'objeto.json');
    writeFileSync(objeto, '{"a":1}', 'utf-8');
    expect(() => cargarRegistros(objeto)).toThrow(`El JSON ${objeto} debe ser una lista de objetos`);
  });
});
