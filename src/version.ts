export const NAME = 'cargo-ci';
export const VERSION = '0.1.0';
