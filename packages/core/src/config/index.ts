export { parseIni, mergeConfigParameters, harvestConfig } from './ini.js';
