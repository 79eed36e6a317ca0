import { describe, expect, it } from 'vitest';
import { parsearPagina, primeraCoincidencia } from './estrategias.js';
import type { Estrategia } from './estrategias.js';
import { extraerBloqueRenglones, extraerRenglonesDeTablas } from './renglones.js';

describe('extraerBloqueRenglones', () => {
  it('une las líneas del bloque hasta el cierre ×', () => {
    const lineas = ['Datos', 'DETALLE DE PRODUCTOS O SERVICIOS', 'Renglón 1', 'Renglón 2', '×', 'Otro'];
    expect(extraerBloqueRenglones(lineas)).toBe('Renglón 1 | Renglón 2');
  });

  it('corta en un encabezado "#### "', () => {
    const lineas = ['Renglones de la convocatoria', 'Item A', '#### Anexos', 'Pliego'];
    expect(extraerBloqueRenglones(lineas)).toBe('Item A');
  });

  it('reconoce encabezados con acentos', () => {
    expect(extraerBloqueRenglones(['Detalle de bienes y servicios:', 'Tóner'])).toBe('Tóner');
  });

  it('sin encabezado o sin contenido devuelve null', () => {
    expect(extraerBloqueRenglones(['Objeto', 'Algo'])).toBeNull();
    expect(extraerBloqueRenglones(['Renglones convocatoria', '×'])).toBeNull();
  });
});

describe('extraerRenglonesDeTablas', () => {
  it('usa las tablas cuyo encabezado es de renglones', () => {
    const pagina = parsearPagina(
      `<table><tr><th>Número de renglón</th><th>Descripción</th><th>Cantidad</th></tr>
        <tr><td>1</td><td>Notebook 14"</td><td>10</td></tr>
        <tr><td>2</td><td>Monitor</td><td></td></tr></table>
       <table><tr><th>Nombre</th></tr><tr><td>Ignorada</td></tr></table>`,
      'https://comprar.test/detalle'
    );
    expect(extraerRenglonesDeTablas(pagina)).toBe('1 | Notebook 14" | 10; 2 | Monitor');
  });

  it('sin tablas de renglones devuelve null', () => {
    expect(extraerRenglonesDeTablas(parsearPagina('<table><tr><td>x</td></tr></table>', 'u'))).toBeNull();
  });
});

describe('primeraCoincidencia', () => {
  it('gana la primera estrategia con valor', () => {
    const pagina = parsearPagina('<p>x</p>', 'u');
    const llamadas: string[] = [];
    const estrategias: Estrategia[] = [
      () => {
        llamadas.push('a');
        return null;
      },
      () => {
        llamadas.push('b');
        return 'valor';
      },
      () => {
        llamadas.push('c');
        return 'otro';
      },
    ];
    expect(primeraCoincidencia(pagina, estrategias)).toBe('valor');
    expect(llamadas).toEqual(['a', 'b']);
  });
});
