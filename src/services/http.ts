import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { wrapper } from 'axios-cookiejar-support';
import { CookieJar } from 'tough-cookie';
import * as qs from 'qs';
import type { ScraperConfig } from '../config/scraper-config.js';
import { logger } from '../utils/logger.js';

export interface RespuestaHttp {
  // URL final, después de redirecciones
  url: string;
  status: number;
  contentType: string;
  html: string;
}

/**
 * Sesión HTTP con cookies compartidas entre requests (ASP.NET guarda
 * el estado de la grilla en la sesión).
 */
export interface SesionHttp {
  get(url: string): Promise<RespuestaHttp>;
  postFormulario(url: string, datos: Record<string, string>): Promise<RespuestaHttp>;
}

function urlFinal(request: unknown, porDefecto: string): string {
  if (typeof request === 'object' && request !== null && 'res' in request) {
    const res = request.res;
    if (typeof res === 'object' && res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string') {
      return res.responseUrl;
    }
  }
  return porDefecto;
}

function aRespuesta(response: AxiosResponse<unknown>, url: string): RespuestaHttp {
  const contentType = response.headers['content-type'];
  return {
    url: urlFinal(response.request, url),
    status: response.status,
    contentType: typeof contentType === 'string' ? contentType.toLowerCase() : '',
    html: typeof response.data === 'string' ? response.data : String(response.data ?? ''),
  };
}

class SesionAxios implements SesionHttp {
  private client: AxiosInstance;

  constructor(config: ScraperConfig) {
    this.client = wrapper(
      axios.create({
        jar: new CookieJar(),
        withCredentials: true,
        responseType: 'text',
        timeout: config.timeoutMs,
        headers: {
          'User-Agent': config.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'es-AR,es;q=0.9,en;q=0.8',
        },
      })
    );
  }

  async get(url: string): Promise<RespuestaHttp> {
    logger.debug('GET %s', url);
    const response = await this.client.get<unknown>(url);
    return aRespuesta(response, url);
  }

  async postFormulario(url: string, datos: Record<string, string>): Promise<RespuestaHttp> {
    logger.debug({ eventTarget: datos.__EVENTTARGET }, 'POST %s', url);
    const response = await this.client.post<unknown>(url, qs.stringify(datos), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });
    return aRespuesta(response, url);
  }
}

/**
 * Una sesión por corrida: cookie jar nuevo, sin estado entre ejecuciones.
 */
export function crearSesionHttp(config: ScraperConfig): SesionHttp {
  return new SesionAxios(config);
}
