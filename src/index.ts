// Public API

export * from '@/lib/coordinates';
export { createLogger, getLogLevel, setLogLevel, type LogLevel, type Logger } from '@/lib/logger';
export * from '@/lib/errors';
export * from '@/lib/config';

export * from '@/lib/card/color';
export * from '@/lib/card/schemas';
export type * from '@/lib/card/types';
export * from '@/lib/card/parse';

export { parsePathData, isPathCommandLetter, PATH_PARAM_COUNTS } from '@/lib/path/pathParser';
export { interpretPath, pathDataToSegments, quadraticToCubic } from '@/lib/path/pathGeometry';

export type * from '@/lib/render/types';
export * from '@/lib/render/pathBuilder';
export * from '@/lib/render/gradientUtils';
export { GradientRenderer } from '@/lib/render/gradientRenderer';
export * from '@/lib/render/patternRenderer';
export * from '@/lib/render/clippingRenderer';
export * from '@/lib/render/shapeRenderer';
export * from '@/lib/render/imageSizing';
export * from '@/lib/render/printFeatures';
export * from '@/lib/render/cardRenderer';
export * from '@/lib/render/recordingSurface';

export * from '@/lib/text-measurement-utils';
export * from '@/lib/text/textFitting';

export { DecorativeLibrary } from '@/lib/decorative/decorativeLibrary';
export * from '@/lib/decorative/types';

export { PdfSurface, pathOperators } from '@/lib/pdf/pdfSurface';
export { FontCollection, normalizeFontFamily, resolveStandardFont } from '@/lib/pdf/fontUtils';
export * from '@/lib/pdf/renderCardPdf';
