import { mkdirSync } from 'fs';
import type { ScraperConfig } from '../config/scraper-config.js';
import { esTic, textoParaClasificar } from '../services/clasificador.js';
import { crearEstrategiaHttp } from '../services/estrategia-http.js';
import type { EstrategiaComprar, TipoEstrategia } from '../services/estrategia-http.js';
import { crearEstrategiaNavegador } from '../services/estrategia-navegador.js';
import { recorrerListado } from '../services/listado.js';
import type {
  CancelPredicate,
  DetalleConvocatoria,
  FilaListado,
  ProcesoCompra,
  ResultadoScraping,
} from '../types/index.js';
import { logger } from '../utils/logger.js';
import { extraerAnio } from '../utils/text.js';
import type { AdapterFuente } from './pipeline.js';
import { ProgressReporter, finalizarCorrida, resolverConfig } from './pipeline.js';

export type FabricaEstrategia = (config: ScraperConfig) => Promise<EstrategiaComprar>;

export const PREFIJOS_COMPRAR: Record<TipoEstrategia, string> = {
  http: 'comprar_tics',
  navegador: 'comprar_robot',
};

const fabricaPorDefecto =
  (tipo: TipoEstrategia): FabricaEstrategia =>
  async (config) =>
    tipo === 'http' ? crearEstrategiaHttp(config) : crearEstrategiaNavegador(config);

function urlDeFila(fila: FilaListado): string | null {
  return fila.enlace?.tipo === 'url' ? fila.enlace.url : null;
}

/**
 * Listado + detalle → registro normalizado. Gana el valor del detalle;
 * el del listado queda como default.
 */
export function combinarFila(
  fila: FilaListado,
  detalle: DetalleConvocatoria | null,
  palabrasTic: readonly string[]
): ProcesoCompra {
  const base = {
    numero_proceso: detalle?.numero_proceso || fila.numero_proceso,
    expediente: detalle?.expediente ?? null,
    nombre_proceso: detalle?.nombre_proceso || fila.nombre_proceso,
    tipo_proceso: detalle?.tipo_proceso || fila.tipo_proceso,
    fecha_apertura: detalle?.fecha_apertura || fila.fecha_apertura,
    estado: detalle?.estado || fila.estado,
    unidad_ejecutora: detalle?.unidad_ejecutora || fila.unidad_ejecutora,
    saf: detalle?.saf || fila.saf,
    detalle_productos: detalle?.detalle_productos ?? null,
    pliego_nombre: detalle?.pliego_nombre ?? null,
    pliego_url: detalle?.pliego_url ?? null,
    url_detalle: detalle?.url || urlDeFila(fila),
  };

  return {
    ...base,
    origen: 'COMPRAR',
    es_tic: esTic(textoParaClasificar(base), palabrasTic),
    anio: extraerAnio(base.fecha_apertura),
  };
}

/**
 * Recorre el listado y entra al detalle de cada fila. Un detalle que falla
 * deja la fila con los datos del listado.
 */
export async function recolectarComprar(
  estrategia: EstrategiaComprar,
  config: ScraperConfig,
  progreso: ProgressReporter,
  isCancelled?: CancelPredicate
): Promise<ResultadoScraping> {
  const cancelado = () => isCancelled?.() ?? false;
  const registros: ProcesoCompra[] = [];
  let vistas = 0;

  const paginas = recorrerListado(estrategia.listado, {
    baseUrl: config.comprarBaseUrl,
    maxPaginas: config.maxPaginas,
    delayMs: config.delayListadoMs,
    isCancelled,
  });

  for await (const { numero, pagina, filas, filasEsperadas } of paginas) {
    vistas += filas.length;
    logger.info('--- Página %d: %d filas ---', numero, filas.length);

    for (const fila of filas) {
      if (cancelado()) {
        logger.warn('Cancelado por el usuario en %s', fila.numero_proceso);
        return { registros, estado: 'cancelado' };
      }

      let detalle: DetalleConvocatoria | null = null;
      try {
        detalle = await estrategia.obtenerDetalle(fila, pagina);
        if (!detalle) logger.debug('Sin detalle para %s, se usan datos del listado', fila.numero_proceso);
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        logger.error({ err, numero: fila.numero_proceso }, 'Error al scrapear detalle');
      }

      registros.push(combinarFila(fila, detalle, config.palabrasTic));
      // Sin total informado, las filas vistas son un denominador provisorio
      if (filasEsperadas === null) progreso.reportar(registros.length, vistas, 99);
      else progreso.reportar(registros.length, filasEsperadas);
    }
  }

  return { registros, estado: cancelado() ? 'cancelado' : 'completado' };
}

/**
 * Corrida completa con la estrategia indicada; el navegador siempre se cierra.
 */
export async function ejecutarComprar(
  tipo: TipoEstrategia,
  config: ScraperConfig,
  progreso: ProgressReporter,
  isCancelled?: CancelPredicate,
  fabrica: FabricaEstrategia = fabricaPorDefecto(tipo)
): Promise<ResultadoScraping> {
  logger.info('=== COMPR.AR (%s): iniciando ===', tipo);
  const estrategia = await fabrica(config);
  try {
    const resultado = await recolectarComprar(estrategia, config, progreso, isCancelled);
    logger.info('COMPR.AR: %d procesos (%s)', resultado.registros.length, resultado.estado);
    return resultado;
  } finally {
    await estrategia.cerrar();
  }
}

export function crearAdapterComprar(tipo: TipoEstrategia, fabrica?: FabricaEstrategia): AdapterFuente {
  return async (desde, hasta, carpetaSalida, opciones = {}) => {
    const config = resolverConfig(opciones);
    const progreso = new ProgressReporter(opciones.onProgress);
    mkdirSync(carpetaSalida, { recursive: true });

    const resultado = await ejecutarComprar(tipo, config, progreso, opciones.isCancelled, fabrica);

    // El rango solo nombra el archivo: COMPR.AR lista todo lo vigente
    return finalizarCorrida(resultado, progreso, {
      carpeta: carpetaSalida,
      prefijo: PREFIJOS_COMPRAR[tipo],
      desde,
      hasta,
      formatos: config.formatos,
    });
  };
}

export const scrapeComprarTics = crearAdapterComprar('http');
export const scrapeComprarTicsRobot = crearAdapterComprar('navegador');
