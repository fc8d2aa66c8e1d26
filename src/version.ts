/** Package version reported by `pebble --version` */
export const VERSION = '0.1.0';
