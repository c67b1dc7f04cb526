export const PROXY_API_CONFIG = Symbol('PROXY_API_CONFIG')
export const PROXY_API_LOGGER = Symbol('PROXY_API_LOGGER')
export const PROXY_API_FETCH_IMPL = Symbol('PROXY_API_FETCH_IMPL')
export const PROXY_API_NOW = Symbol('PROXY_API_NOW')
export const PROXY_API_REQUEST_HANDLER = Symbol('PROXY_API_REQUEST_HANDLER')
