// === Registro normalizado ===

export type Origen = 'COMPRAR' | 'BORA';

export interface ProcesoCompra {
  numero_proceso: string | null;
  expediente: string | null;
  nombre_proceso: string | null;
  tipo_proceso: string | null;
  // Texto libre tal como lo publica la fuente (ej: "18/07/2025 10:30 Hrs.")
  fecha_apertura: string | null;
  estado: string | null;
  unidad_ejecutora: string | null;
  saf: string | null;
  detalle_productos: string | null;
  pliego_nombre: string | null;
  pliego_url: string | null;
  url_detalle: string | null;
  origen: Origen;
  es_tic: boolean;
  anio: number | null;
  // Solo Boletín Oficial
  fecha_publicacion?: string | null;
  fecha_edicion?: string | null;
  titulo_listado?: string | null;
  resumen?: string | null;
}

// === Listado COMPR.AR ===

export type EnlaceDetalle =
  | { tipo: 'url'; url: string }
  | { tipo: 'postback'; target: string; argumento: string };

export interface FilaListado {
  numero_proceso: string;
  nombre_proceso: string | null;
  tipo_proceso: string | null;
  fecha_apertura: string | null;
  estado: string | null;
  unidad_ejecutora: string | null;
  saf: string | null;
  enlace: EnlaceDetalle | null;
}

/** Página HTML tal como la devolvió el servidor (o el browser). */
export interface PaginaHtml {
  url: string;
  html: string;
}

export interface PliegoInfo {
  pliego_nombre: string | null;
  pliego_url: string | null;
}

export interface DetalleConvocatoria extends PliegoInfo {
  numero_proceso: string | null;
  expediente: string | null;
  nombre_proceso: string | null;
  tipo_proceso: string | null;
  fecha_apertura: string | null;
  estado: string | null;
  unidad_ejecutora: string | null;
  saf: string | null;
  detalle_productos: string | null;
  url: string;
}

// === Boletín Oficial ===

export interface AvisoBoletin {
  titulo_listado: string;
  url: string;
  fecha_edicion: string;
}

export interface DetalleAviso {
  organismo: string | null;
  proceso: string | null;
  fecha_publicacion: string | null;
  resumen_proyecto: string | null;
  objeto_resumen: string | null;
  url: string;
}

// === Contrato de los adapters ===

export type ProgressCallback = (porcentaje: number) => void;
export type CancelPredicate = () => boolean;

export type FormatoExport = 'xlsx' | 'json';

export type EstadoEjecucion = 'completado' | 'cancelado';

export interface ResultadoScraping {
  registros: ProcesoCompra[];
  estado: EstadoEjecucion;
}

// === Selectores y marcadores de COMPR.AR ===

export const COMPRAR_PATHS = {
  default: '/Default.aspx',
  // Endpoint de "Ver todos" (Procesos de compra)
  listado: '/Compras.aspx?qs=W1HXHGHtH10=',
} as const;

export const SELECTORS = {
  comprar: {
    verTodos: 'Ver todos',
    // Encabezados que identifican la grilla de resultados
    encabezadosGrilla: ['Número de Proceso', 'Nombre descriptivo de Proceso', 'Fecha de Apertura'],
    // ID del control GridView; si aparece en la respuesta seguimos en el listado
    marcadorGrilla: 'GridListaPliegosAperturaProxima',
  },
  boletin: {
    enlaceAviso: '/detalleAviso/tercera/',
  },
} as const;
