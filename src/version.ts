export const NAME = 'surgebench';
export const VERSION = '0.1.0';
