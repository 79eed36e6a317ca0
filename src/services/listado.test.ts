import { describe, expect, it } from 'vitest';
import { BASE_COMPRAR, GRID, URL_LISTADO, listadoHtml } from '../testing/comprar-html.js';
import type { PaginaHtml } from '../types/index.js';
import type { NavegadorListado, OpcionesRecorrido, PaginaListado } from './listado.js';
import { recorrerListado } from './listado.js';

const rango = (desde: number, hasta: number) => Array.from({ length: hasta - desde + 1 }, (_, i) => desde + i);

class NavegadorFalso implements NavegadorListado {
  readonly llamadas: string[] = [];

  constructor(
    private readonly primera: string,
    private readonly paginas: Record<string, string>
  ) {}

  async abrir(): Promise<PaginaHtml> {
    this.llamadas.push('abrir');
    return { url: URL_LISTADO, html: this.primera };
  }

  async abrirEnlace(url: string): Promise<PaginaHtml> {
    this.llamadas.push(`enlace ${url}`);
    return { url, html: this.pagina(url) };
  }

  async postback(desde: PaginaHtml, target: string, argumento: string): Promise<PaginaHtml> {
    this.llamadas.push(`postback ${target} ${argumento}`);
    return { url: desde.url, html: this.pagina(argumento) };
  }

  private pagina(clave: string): string {
    const html = this.paginas[clave];
    if (html === undefined) throw new Error(`Página no prevista: ${clave}`);
    return html;
  }
}

async function recorrer(navegador: NavegadorListado, opciones: Partial<OpcionesRecorrido> = {}) {
  const paginas: PaginaListado[] = [];
  for await (const pagina of recorrerListado(navegador, { baseUrl: BASE_COMPRAR, ...opciones })) {
    paginas.push(pagina);
  }
  return paginas;
}

describe('recorrerListado', () => {
  it('pagina por postback hasta la cantidad esperada', async () => {
    const navegador = new NavegadorFalso(listadoHtml({ filas: rango(1, 12), total: 15, paginasPostback: [2] }), {
      Page$2: listadoHtml({ filas: rango(13, 15), total: 15 }),
    });

    const paginas = await recorrer(navegador);

    expect(paginas.map((p) => p.numero)).toEqual([1, 2]);
    expect(paginas.flatMap((p) => p.filas).map((f) => f.nombre_proceso)).toEqual(
      rango(1, 15).map((i) => `Listado ${i}`)
    );
    expect(paginas[0].filasEsperadas).toBe(15);
    expect(navegador.llamadas).toEqual(['abrir', `postback ${GRID} Page$2`]);
  });

  it('sin total sigue mientras el paginador ofrezca la próxima página', async () => {
    const navegador = new NavegadorFalso(listadoHtml({ filas: [1, 2], paginasPostback: [2, 3] }), {
      Page$2: listadoHtml({ filas: [3, 4], paginasPostback: [3] }),
      Page$3: listadoHtml({ filas: [5] }),
    });

    const paginas = await recorrer(navegador);

    expect(paginas.map((p) => p.numero)).toEqual([1, 2, 3]);
    expect(paginas[0].filasEsperadas).toBeNull();
  });

  it('sigue links numéricos directos cuando existen', async () => {
    const pagina2 = `${BASE_COMPRAR}/Compras.aspx?page=2`;
    const pagina3 = `${BASE_COMPRAR}/Compras.aspx?page=3`;
    const navegador = new NavegadorFalso(
      listadoHtml({
        filas: [1, 2],
        enlaces: [
          ['2', '/Compras.aspx?page=2'],
          ['3', '/Compras.aspx?page=3'],
        ],
      }),
      {
        [pagina2]: listadoHtml({ filas: [3, 4] }),
        [pagina3]: listadoHtml({ filas: [5] }),
      }
    );

    const paginas = await recorrer(navegador);

    expect(paginas.map((p) => p.filas.length)).toEqual([2, 2, 1]);
    expect(navegador.llamadas).toEqual(['abrir', `enlace ${pagina2}`, `enlace ${pagina3}`]);
  });

  it('saltea links que vuelven a una página ya recorrida', async () => {
    const pagina1 = `${BASE_COMPRAR}/Compras.aspx?page=1`;
    const pagina2 = `${BASE_COMPRAR}/Compras.aspx?page=2`;
    const navegador = new NavegadorFalso(
      listadoHtml({
        filas: [1, 2],
        enlaces: [
          ['1', '/Compras.aspx?page=1'],
          ['2', '/Compras.aspx?page=2'],
        ],
      }),
      {
        [pagina1]: listadoHtml({ filas: [1, 2] }),
        [pagina2]: listadoHtml({ filas: [3] }),
      }
    );

    const paginas = await recorrer(navegador);

    expect(paginas.map((p) => [p.numero, p.filas.length])).toEqual([
      [1, 2],
      [2, 1],
    ]);
    expect(navegador.llamadas).toEqual(['abrir', `enlace ${pagina1}`, `enlace ${pagina2}`]);
  });

  it('corta si un postback devuelve filas ya vistas', async () => {
    const navegador = new NavegadorFalso(listadoHtml({ filas: [1, 2], paginasPostback: [2] }), {
      Page$2: listadoHtml({ filas: [1, 2], paginasPostback: [3] }),
    });

    const paginas = await recorrer(navegador);

    expect(paginas.map((p) => p.numero)).toEqual([1]);
    expect(navegador.llamadas).toEqual(['abrir', `postback ${GRID} Page$2`]);
  });

  it('respeta maxPaginas y ajusta las filas esperadas', async () => {
    const navegador = new NavegadorFalso(listadoHtml({ filas: rango(1, 12), total: 40, paginasPostback: [2] }), {});

    const paginas = await recorrer(navegador, { maxPaginas: 1 });

    expect(paginas).toHaveLength(1);
    expect(paginas[0].filasEsperadas).toBe(12);
    expect(navegador.llamadas).toEqual(['abrir']);
  });

  it('deja de pedir páginas al cancelar', async () => {
    let cancelado = false;
    const navegador = new NavegadorFalso(listadoHtml({ filas: [1], total: 3, paginasPostback: [2] }), {
      Page$2: listadoHtml({ filas: [2], total: 3, paginasPostback: [3] }),
    });

    const paginas: PaginaListado[] = [];
    for await (const pagina of recorrerListado(navegador, { baseUrl: BASE_COMPRAR, isCancelled: () => cancelado })) {
      paginas.push(pagina);
      if (pagina.numero === 2) cancelado = true;
    }

    expect(paginas.map((p) => p.numero)).toEqual([1, 2]);
    expect(navegador.llamadas).toEqual(['abrir', `postback ${GRID} Page$2`]);
  });

  it('un listado vacío rinde una sola página sin filas', async () => {
    const navegador = new NavegadorFalso(listadoHtml({ filas: [], total: 0 }), {});
    const paginas = await recorrer(navegador);
    expect(paginas).toHaveLength(1);
    expect(paginas[0].filas).toEqual([]);
  });
});
