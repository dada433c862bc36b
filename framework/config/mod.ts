/**
 * Configuration
 *
 * Library settings: inference suffix, redecoration warnings, logging and
 * tracing switches.
 */

export { Config, type ConfigOptions, loadConfig, getConfig, setConfig } from './config.ts';
