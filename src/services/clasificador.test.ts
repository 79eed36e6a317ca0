import { describe, expect, it } from 'vitest';
import { cargarPalabrasTic } from '../config/scraper-config.js';
import { esTic, textoParaClasificar } from './clasificador.js';

describe('esTic', () => {
  const palabras = ['informática', 'servidor', 'pc'];

  it('ignora acentos y mayúsculas en ambos lados', () => {
    expect(esTic('SERVICIO DE INFORMATICA', palabras)).toBe(true);
    expect(esTic('Adquisición de SERVIDORES', palabras)).toBe(true);
  });

  it('descarta claves de dos letras o menos', () => {
    expect(esTic('Compra de pc', palabras)).toBe(false);
  });

  it('sin coincidencias o sin texto es false', () => {
    expect(esTic('Compra de mobiliario', palabras)).toBe(false);
    expect(esTic(null, palabras)).toBe(false);
    expect(esTic('', palabras)).toBe(false);
  });

  it('funciona con la lista de palabras del proyecto', () => {
    expect(esTic('Adquisición de Notebooks para el área contable', cargarPalabrasTic())).toBe(true);
    expect(esTic('Servicio de limpieza integral', cargarPalabrasTic())).toBe(false);
  });
});

describe('textoParaClasificar', () => {
  it('une nombre y detalle sin nulos', () => {
    expect(textoParaClasificar({ nombre_proceso: 'Servidores', detalle_productos: null })).toBe('Servidores');
    expect(textoParaClasificar({ nombre_proceso: 'A', detalle_productos: 'B' })).toBe('A B');
  });
});
