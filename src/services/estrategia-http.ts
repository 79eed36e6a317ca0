import type { ScraperConfig } from '../config/scraper-config.js';
import { cargarHtml } from '../parsers/lineas.js';
import { leerEstadoFormulario } from '../parsers/listado-comprar.js';
import { COMPRAR_PATHS } from '../types/index.js';
import type { DetalleConvocatoria, FilaListado, PaginaHtml } from '../types/index.js';
import { sleep } from '../utils/dates.js';
import { guardarHtml } from '../utils/debug-html.js';
import { resolverDetalle } from './detalle.js';
import { crearSesionHttp } from './http.js';
import type { RespuestaHttp, SesionHttp } from './http.js';
import type { NavegadorListado } from './listado.js';

export type TipoEstrategia = 'http' | 'navegador';

/**
 * Fuente de páginas para el adapter de COMPR.AR: listado + detalle.
 */
export interface EstrategiaComprar {
  tipo: TipoEstrategia;
  listado: NavegadorListado;
  obtenerDetalle(fila: FilaListado, pagina: PaginaHtml): Promise<DetalleConvocatoria | null>;
  cerrar(): Promise<void>;
}

function aPagina(respuesta: RespuestaHttp): PaginaHtml {
  return { url: respuesta.url, html: respuesta.html };
}

export function urlListado(config: ScraperConfig): string {
  return new URL(COMPRAR_PATHS.listado, config.comprarBaseUrl).toString();
}

/**
 * Estrategia por requests directos con cookie jar.
 */
export function crearEstrategiaHttp(
  config: ScraperConfig,
  sesion: SesionHttp = crearSesionHttp(config)
): EstrategiaComprar {
  let paginas = 0;
  const conDebug = (respuesta: RespuestaHttp): PaginaHtml => {
    paginas++;
    guardarHtml(config, `listado_${paginas}`, respuesta.html);
    return aPagina(respuesta);
  };

  const listado: NavegadorListado = {
    abrir: async () => conDebug(await sesion.get(urlListado(config))),
    abrirEnlace: async (url) => conDebug(await sesion.get(url)),
    postback: async (desde, target, argumento) =>
      conDebug(
        await sesion.postFormulario(desde.url, {
          ...leerEstadoFormulario(cargarHtml(desde.html)),
          __EVENTTARGET: target,
          __EVENTARGUMENT: argumento,
        })
      ),
  };

  return {
    tipo: 'http',
    listado,
    obtenerDetalle: async (fila, pagina) => {
      if (!fila.enlace) return null;
      await sleep(config.delayDetalleMs);
      return resolverDetalle(sesion, fila.enlace, pagina, config);
    },
    // Nada que liberar: el cookie jar muere con la sesión
    cerrar: async () => {},
  };
}
