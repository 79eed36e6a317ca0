import { buildScraperConfig } from '../config/scraper-config.js';
import type { ScraperConfig } from '../config/scraper-config.js';
import type { RespuestaHttp, SesionHttp } from '../services/http.js';

export const BASE_COMPRAR = 'https://comprar.test';
export const URL_LISTADO = `${BASE_COMPRAR}/Compras.aspx?qs=W1HXHGHtH10=`;
export const GRID = 'ctl00$CPH1$GridListaPliegosAperturaProxima';

export function configDePrueba(overrides: Partial<ScraperConfig> = {}): ScraperConfig {
  return buildScraperConfig({
    comprarBaseUrl: BASE_COMPRAR,
    boletinBaseUrl: 'https://boletin.test',
    palabrasTic: ['servidor', 'software', 'equipamiento informatico'],
    formatos: ['json'],
    delayListadoMs: 0,
    delayDetalleMs: 0,
    maxPaginas: null,
    debug: false,
    ...overrides,
  });
}

export function numeroProceso(i: number): string {
  return `40-${String(i).padStart(4, '0')}-LPU25`;
}

export function targetFila(i: number): string {
  return `ctl00$CPH1$GridListaPliegosAperturaProxima$ctl${String(i).padStart(2, '0')}$lnkNumeroProceso`;
}

function filaHtml(i: number): string {
  return `<tr>
    <td><a href="javascript:__doPostBack('${targetFila(i)}','')">${numeroProceso(i)}</a></td>
    <td>Listado ${i}</td>
    <td>Licitación Pública</td>
    <td>18/07/2025 10:30 Hrs.</td>
    <td>En apertura</td>
    <td>40 - UOC Pruebas</td>
    <td>300</td>
  </tr>`;
}

export interface OpcionesListado {
  filas: readonly number[];
  total?: number;
  // Páginas ofrecidas por el paginador de postback
  paginasPostback?: readonly number[];
  // Links numéricos directos (texto → href)
  enlaces?: readonly [string, string][];
  viewState?: string;
}

export function listadoHtml(opciones: OpcionesListado): string {
  const total = opciones.total === undefined ? '' : `<span>Se han encontrado (${opciones.total}) resultados</span>`;
  const paginador = (opciones.paginasPostback ?? [])
    .map((p) => `<td><a href="javascript:__doPostBack('${GRID}','Page$${p}')">${p}</a></td>`)
    .join('');
  const enlaces = (opciones.enlaces ?? []).map(([texto, href]) => `<a href="${href}">${texto}</a>`).join(' ');

  return `<html><body><form id="aspnetForm" method="post" action="./Compras.aspx">
    <input type="hidden" name="__VIEWSTATE" value="${opciones.viewState ?? 'vs-1'}" />
    <input type="hidden" name="__EVENTVALIDATION" value="ev-1" />
    ${total}
    <table id="ctl00_CPH1_GridListaPliegosAperturaProxima">
      <tr>
        <th>Número de Proceso</th><th>Nombre descriptivo de Proceso</th><th>Tipo de Proceso</th>
        <th>Fecha de Apertura</th><th>Estado</th><th>Unidad Ejecutora</th><th>Servicio Administrativo Financiero</th>
      </tr>
      ${opciones.filas.map(filaHtml).join('\n')}
      ${paginador ? `<tr><td colspan="7"><table><tr><td><span>1</span></td>${paginador}</tr></table></td></tr>` : ''}
    </table>
    <div class="paginas">${enlaces}</div>
  </form></body></html>`;
}

export function detalleHtml(i: number, opciones: { renglones?: boolean; pliegoHref?: string } = {}): string {
  const renglones =
    opciones.renglones === false
      ? ''
      : `<h4>Detalle de productos o servicios</h4>
         <p>Renglón 1 - Servidor rack lote ${i}</p>
         <p>Renglón 2 - Switch 48 bocas</p>
         <button>×</button>`;

  return `<html><body><form>
    <div><label>Número de Procedimiento</label><span>${numeroProceso(i)}</span></div>
    <div><label>Número de Expediente</label><span>EX-2025-${String(i).padStart(8, '0')}-APN-PRUEBA</span></div>
    <div><label>Objeto</label><span>Servidores lote ${i}</span></div>
    <div><label>Tipo de Procedimiento</label><span>Licitación Pública</span></div>
    <div>Fecha de apertura: 21/07/2025 11:00 Hrs.</div>
    <div>Estado: Publicado</div>
    <div><label>Unidad Operativa de Contrataciones</label><span>40 - UOC Pruebas</span></div>
    <div><label>Servicio Administrativo Financiero</label><span>300</span></div>
    ${renglones}
    <h3>Anexos</h3>
    <table>
      <tr><th>Nombre</th><th>Tipo</th><th>Archivo</th></tr>
      <tr><td>Pliego de bases y condiciones particulares</td><td>Pliego</td>
        <td><a href="${opciones.pliegoHref ?? '/PLIEGO/VistaPreviaPliegoCiudadano.aspx?qs=p' + i}">Descargar</a></td></tr>
    </table>
  </form></body></html>`;
}

export function respuesta(url: string, html: string, extra: Partial<RespuestaHttp> = {}): RespuestaHttp {
  return { url, status: 200, contentType: 'text/html; charset=utf-8', html, ...extra };
}

export interface LlamadaPost {
  url: string;
  datos: Record<string, string>;
}

/**
 * Sesión en memoria: cada request se resuelve con las funciones dadas.
 */
export class SesionFalsa implements SesionHttp {
  readonly gets: string[] = [];
  readonly posts: LlamadaPost[] = [];

  constructor(
    private readonly alGet: (url: string) => RespuestaHttp | Promise<RespuestaHttp>,
    private readonly alPost: (url: string, datos: Record<string, string>) => RespuestaHttp | Promise<RespuestaHttp> = () => {
      throw new Error('POST inesperado');
    }
  ) {}

  async get(url: string): Promise<RespuestaHttp> {
    this.gets.push(url);
    return this.alGet(url);
  }

  async postFormulario(url: string, datos: Record<string, string>): Promise<RespuestaHttp> {
    this.posts.push({ url, datos });
    return this.alPost(url, datos);
  }
}
