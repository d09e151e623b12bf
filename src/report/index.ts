export * from './figure-types.js';
export { buildScalingFigure, buildSpeedupFigure, buildMemoryFigure, formatMegabytes, FIGURE_IDS } from './figures.js';
export { renderFigure, escapeXml, formatTick } from './svg-renderer.js';
export { formatSummaryJson, formatReport, KEY_INSIGHTS } from './summary-report.js';
export { writeArtifact, writeArtifacts, ARTIFACT_NAMES, type Artifact } from './artifacts.js';
export { VARIANT_STYLES, MEMORY_STYLES, type VariantStyle } from './styles.js';
