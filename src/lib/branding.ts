export const PRODUCT_NAME = 'precompile';
export const CLI_NAME = 'precompile';

export const CONFIG_FILE_NAME = 'precompile.config.json';
