export * from './serp.js';
export * from './geo-proxy.js';
