import { mkdirSync } from 'fs';
import type { ScraperConfig } from '../config/scraper-config.js';
import { cargarHtml } from '../parsers/lineas.js';
import { extraerAvisos, parsearAviso } from '../parsers/boletin.js';
import { esTic, textoParaClasificar } from '../services/clasificador.js';
import { COLUMNAS_BOLETIN } from '../services/export-xlsx.js';
import { crearSesionHttp } from '../services/http.js';
import type { SesionHttp } from '../services/http.js';
import type { AvisoBoletin, CancelPredicate, DetalleAviso, ProcesoCompra, ResultadoScraping } from '../types/index.js';
import { diasDelRango, fechaCompacta, fechaIso, sleep } from '../utils/dates.js';
import { guardarHtml } from '../utils/debug-html.js';
import { logger } from '../utils/logger.js';
import { extraerAnio } from '../utils/text.js';
import type { AdapterFuente } from './pipeline.js';
import { ProgressReporter, finalizarCorrida, resolverConfig } from './pipeline.js';

export const PREFIJO_BOLETIN = 'contrataciones_tercera';

export function urlSeccionTercera(config: ScraperConfig, dia: Date): string {
  return `${config.boletinBaseUrl}/seccion/tercera/${fechaCompacta(dia)}`;
}

/**
 * Avisos publicados un día. Si la edición no responde, ese día no tiene avisos.
 */
export async function listarAvisosDelDia(
  sesion: SesionHttp,
  dia: Date,
  config: ScraperConfig
): Promise<AvisoBoletin[]> {
  const url = urlSeccionTercera(config, dia);
  try {
    const respuesta = await sesion.get(url);
    if (respuesta.status !== 200) {
      logger.warn('Edición %s respondió %d', fechaIso(dia), respuesta.status);
      return [];
    }
    guardarHtml(config, `tercera_${fechaCompacta(dia)}`, respuesta.html);
    return extraerAvisos(cargarHtml(respuesta.html), fechaIso(dia), config.boletinBaseUrl);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.warn({ err, url }, 'No se pudo obtener la edición del %s', fechaIso(dia));
    return [];
  }
}

export function avisoARegistro(
  aviso: AvisoBoletin,
  detalle: DetalleAviso,
  palabrasTic: readonly string[]
): ProcesoCompra {
  const base = {
    numero_proceso: detalle.proceso,
    nombre_proceso: detalle.objeto_resumen ?? (aviso.titulo_listado || null),
    detalle_productos: detalle.resumen_proyecto,
  };

  return {
    ...base,
    expediente: null,
    tipo_proceso: null,
    fecha_apertura: null,
    estado: null,
    unidad_ejecutora: detalle.organismo,
    saf: null,
    pliego_nombre: null,
    pliego_url: null,
    url_detalle: detalle.url,
    origen: 'BORA',
    es_tic: esTic(textoParaClasificar(base), palabrasTic),
    // Sin fecha de apertura: el año sale de la publicación
    anio: extraerAnio(detalle.fecha_publicacion),
    fecha_publicacion: detalle.fecha_publicacion,
    fecha_edicion: aviso.fecha_edicion,
    titulo_listado: aviso.titulo_listado || null,
    resumen: detalle.resumen_proyecto,
  };
}

/**
 * Recorre las ediciones día por día. Un aviso que falla se saltea.
 */
export async function recolectarBoletin(
  sesion: SesionHttp,
  desde: Date,
  hasta: Date,
  config: ScraperConfig,
  progreso: ProgressReporter,
  isCancelled?: CancelPredicate
): Promise<ResultadoScraping> {
  const cancelado = () => isCancelled?.() ?? false;
  const dias = diasDelRango(desde, hasta);
  const registros: ProcesoCompra[] = [];

  for (const [indiceDia, dia] of dias.entries()) {
    if (cancelado()) return { registros, estado: 'cancelado' };
    if (indiceDia > 0) await sleep(config.delayListadoMs);

    const avisos = await listarAvisosDelDia(sesion, dia, config);
    logger.info('Edición %s: %d avisos', fechaIso(dia), avisos.length);

    if (avisos.length === 0) {
      progreso.reportar(indiceDia + 1, dias.length);
      continue;
    }

    for (const [k, aviso] of avisos.entries()) {
      if (cancelado()) return { registros, estado: 'cancelado' };
      await sleep(config.delayDetalleMs);

      try {
        const respuesta = await sesion.get(aviso.url);
        guardarHtml(config, `aviso_${fechaCompacta(dia)}_${k + 1}`, respuesta.html);
        const detalle = parsearAviso(cargarHtml(respuesta.html), aviso.url);
        registros.push(avisoARegistro(aviso, detalle, config.palabrasTic));
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        logger.error({ err, url: aviso.url }, 'Error al leer aviso');
      }

      progreso.reportar(indiceDia * avisos.length + k + 1, avisos.length * dias.length);
    }
  }

  return { registros, estado: 'completado' };
}

export const scrapeBoletinTercera: AdapterFuente = async (desde, hasta, carpetaSalida, opciones = {}) => {
  const config = resolverConfig(opciones);
  const progreso = new ProgressReporter(opciones.onProgress);
  mkdirSync(carpetaSalida, { recursive: true });

  logger.info('=== Boletín Oficial (tercera) %s → %s ===', fechaIso(desde), fechaIso(hasta));
  const resultado = await recolectarBoletin(
    crearSesionHttp(config),
    desde,
    hasta,
    config,
    progreso,
    opciones.isCancelled
  );

  return finalizarCorrida(resultado, progreso, {
    carpeta: carpetaSalida,
    prefijo: PREFIJO_BOLETIN,
    desde,
    hasta,
    formatos: config.formatos,
    columnas: COLUMNAS_BOLETIN,
  });
};
