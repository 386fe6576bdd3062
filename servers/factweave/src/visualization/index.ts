export { renderDot, truncateLabel, NetworkVisualizer } from './dot.js';
