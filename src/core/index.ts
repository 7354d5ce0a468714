export { ConfigAccessor } from './config-accessor';
export { getString, getBoolean, getInt, INT32_MAX_VALUE } from './collection-accessor';
export { parseBoolean, parseInt32, parseInt64, parseDouble, parseDate } from './converters';
