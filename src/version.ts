export const NAME = 'clustersched';
export const VERSION = '0.1.0';
