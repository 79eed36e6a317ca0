import type { Browser, Page, Target } from 'puppeteer-core';
import type { ScraperConfig } from '../config/scraper-config.js';
import { extraerNumeroGde } from '../parsers/convocatoria.js';
import { parsearPagina } from '../parsers/estrategias.js';
import { COMPRAR_PATHS, SELECTORS } from '../types/index.js';
import type { DetalleConvocatoria, PaginaHtml } from '../types/index.js';
import { randomDelay } from '../utils/dates.js';
import { guardarHtml } from '../utils/debug-html.js';
import { logger } from '../utils/logger.js';
import { closeBrowser, launchBrowser, newPage } from './browser.js';
import { completarDesdePliego, extraerDetalle } from './detalle.js';
import type { CargadorPliego } from './detalle.js';
import type { EstrategiaComprar } from './estrategia-http.js';
import { urlListado } from './estrategia-http.js';
import type { NavegadorListado } from './listado.js';

const ENCABEZADOS_GRILLA = [...SELECTORS.comprar.encabezadosGrilla];

async function capturar(page: Page): Promise<PaginaHtml> {
  return { url: page.url(), html: await page.content() };
}

async function esperarGrilla(page: Page, timeout: number): Promise<boolean> {
  try {
    await page.waitForFunction(
      (encabezados: string[]) =>
        Array.from(document.querySelectorAll('table tr')).some((tr) =>
          encabezados.every((h) => (tr.textContent ?? '').includes(h))
        ),
      { timeout },
      ENCABEZADOS_GRILLA
    );
    return true;
  } catch {
    logger.warn('Timeout esperando la grilla del listado');
    return false;
  }
}

/**
 * Espera una pestaña nueva. Resuelve null si vence el plazo o si se cancela.
 */
function esperarNuevaPestana(browser: Browser, timeout: number): { promesa: Promise<Page | null>; cancelar: () => void } {
  let cancelar: () => void = () => {};

  const promesa = new Promise<Page | null>((resolve) => {
    const onTarget = (target: Target) => {
      if (target.type() !== 'page') return;
      target
        .page()
        .then((nueva) => {
          if (!nueva) return;
          logger.debug('Nueva pestaña detectada');
          terminar(nueva);
        })
        .catch((error: unknown) => {
          const err = error instanceof Error ? error : new Error(String(error));
          logger.warn({ err }, 'No se pudo tomar la pestaña nueva');
        });
    };
    const timeoutId = setTimeout(() => terminar(null), timeout);
    const terminar = (resultado: Page | null) => {
      clearTimeout(timeoutId);
      browser.off('targetcreated', onTarget);
      resolve(resultado);
    };
    cancelar = () => terminar(null);
    browser.on('targetcreated', onTarget);
  });

  return { promesa, cancelar };
}

/**
 * Abre Default.aspx y hace click en "Ver todos". Si el link no aparece,
 * va directo al endpoint del listado.
 */
async function irAlListado(page: Page, config: ScraperConfig): Promise<void> {
  logger.info('Navegando al listado "Ver todos"...');
  await page.goto(new URL(COMPRAR_PATHS.default, config.comprarBaseUrl).toString(), {
    waitUntil: 'networkidle2',
  });

  const navegacion = page
    .waitForNavigation({ waitUntil: 'networkidle2', timeout: config.browserTimeoutMs })
    .catch(() => logger.debug('waitForNavigation timeout, verificando estado'));

  const clicked = await page.evaluate((texto: string) => {
    const link = Array.from(document.querySelectorAll('a')).find((a) => (a.textContent ?? '').includes(texto));
    if (!link) return false;
    link.click();
    return true;
  }, SELECTORS.comprar.verTodos);

  if (clicked) {
    await navegacion;
  } else {
    logger.warn('Link "Ver todos" no encontrado, abriendo el listado directo');
    await page.goto(urlListado(config), { waitUntil: 'networkidle2' });
  }

  await esperarGrilla(page, config.browserTimeoutMs);
  await randomDelay(300, 800);
}

/**
 * Cambia de página en el paginador: click en el número o, si no está
 * visible, el mismo __doPostBack que dispararía el link.
 */
async function irAPagina(page: Page, target: string, argumento: string, config: ScraperConfig): Promise<void> {
  const numero = argumento.replace('Page$', '');
  logger.info('Navegando a la página %s del listado...', numero);

  const navegacion = page
    .waitForNavigation({ waitUntil: 'networkidle2', timeout: config.browserTimeoutMs })
    .catch(() => logger.debug('waitForNavigation timeout en paginación'));

  const metodo = await page.evaluate(
    (texto: string, eventTarget: string, eventArgument: string) => {
      const link = Array.from(document.querySelectorAll('a')).find((a) => (a.textContent ?? '').trim() === texto);
      if (link) {
        link.click();
        return 'click';
      }
      const doPostBack: unknown = Reflect.get(window, '__doPostBack');
      if (typeof doPostBack === 'function') {
        doPostBack(eventTarget, eventArgument);
        return 'postback';
      }
      return 'ninguno';
    },
    numero,
    target,
    argumento
  );

  if (metodo === 'ninguno') {
    throw new Error(`No se pudo paginar a ${argumento}: sin link ni __doPostBack`);
  }

  await navegacion;
  await esperarGrilla(page, config.browserTimeoutMs);
  await randomDelay(300, 800);
}

/**
 * Pliegos en una pestaña aparte para no perder el listado.
 */
function cargadorPliegoNavegador(browser: Browser, config: ScraperConfig): CargadorPliego {
  return async (url) => {
    const pestana = await newPage(browser, config);
    try {
      const respuesta = await pestana.goto(url, { waitUntil: 'networkidle2' });
      const contentType = (respuesta?.headers()['content-type'] ?? '').toLowerCase();
      return { contentType, html: await pestana.content() };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.warn({ err, url }, 'No se pudo abrir el pliego');
      return null;
    } finally {
      await pestana.close();
    }
  };
}

async function volverAlListado(page: Page, destino: Page, config: ScraperConfig): Promise<void> {
  if (destino !== page) {
    await destino.close();
    return;
  }
  await page
    .goBack({ waitUntil: 'networkidle2' })
    .catch(() => logger.debug('goBack timeout, verificando grilla'));
  await esperarGrilla(page, config.browserTimeoutMs);
}

/**
 * Click en el número de proceso, captura del detalle renderizado y vuelta al listado.
 */
async function visitarDetalle(
  browser: Browser,
  page: Page,
  numeroProceso: string,
  config: ScraperConfig
): Promise<DetalleConvocatoria | null> {
  const urlAnterior = page.url();
  const nuevaPestana = esperarNuevaPestana(browser, config.browserTimeoutMs);
  const navegacion = page
    .waitForNavigation({ waitUntil: 'networkidle2', timeout: config.browserTimeoutMs })
    .then(() => page)
    .catch(() => null);

  const clicked = await page.evaluate((numero: string) => {
    const link = Array.from(document.querySelectorAll('a')).find((a) => (a.textContent ?? '').trim() === numero);
    if (!link) return false;
    link.scrollIntoView();
    link.click();
    return true;
  }, numeroProceso);

  if (!clicked) {
    nuevaPestana.cancelar();
    logger.warn('No se encontró link clickeable para %s', numeroProceso);
    return null;
  }

  let destino = await Promise.race([nuevaPestana.promesa, navegacion]);
  nuevaPestana.cancelar();
  if (!destino && page.url() !== urlAnterior) destino = page;
  if (!destino) {
    logger.warn('El click en %s no abrió el detalle', numeroProceso);
    return null;
  }

  try {
    if (destino !== page) {
      await destino.waitForSelector('body').catch(() => logger.debug('Timeout esperando body en la pestaña nueva'));
    }
    await randomDelay(300, 700);

    const { url, html } = await capturar(destino);
    guardarHtml(config, `detalle_${numeroProceso}`, html);

    const detalle = await completarDesdePliego(
      extraerDetalle(html, url, config),
      cargadorPliegoNavegador(browser, config)
    );

    // En el robot, "Pliego N°" es el Número GDE del detalle
    const numeroGde = extraerNumeroGde(parsearPagina(html, url));
    return numeroGde ? { ...detalle, pliego_nombre: numeroGde } : detalle;
  } finally {
    await volverAlListado(page, destino, config);
  }
}

/**
 * Estrategia con navegador real: clicks en la UI en lugar de requests.
 */
export async function crearEstrategiaNavegador(config: ScraperConfig): Promise<EstrategiaComprar> {
  const browser = await launchBrowser(config);
  const page = await newPage(browser, config).catch(async (error: unknown) => {
    await closeBrowser(browser);
    throw error;
  });

  let paginas = 0;
  const capturarListado = async (): Promise<PaginaHtml> => {
    paginas++;
    const pagina = await capturar(page);
    guardarHtml(config, `listado_robot_${paginas}`, pagina.html);
    return pagina;
  };

  const listado: NavegadorListado = {
    abrir: async () => {
      await irAlListado(page, config);
      return capturarListado();
    },
    abrirEnlace: async (url) => {
      await page.goto(url, { waitUntil: 'networkidle2' });
      await esperarGrilla(page, config.browserTimeoutMs);
      return capturarListado();
    },
    postback: async (_desde, target, argumento) => {
      await irAPagina(page, target, argumento, config);
      return capturarListado();
    },
  };

  return {
    tipo: 'navegador',
    listado,
    obtenerDetalle: async (fila) => {
      await randomDelay(config.delayDetalleMs, config.delayDetalleMs * 2);
      return visitarDetalle(browser, page, fila.numero_proceso, config);
    },
    cerrar: () => closeBrowser(browser),
  };
}
