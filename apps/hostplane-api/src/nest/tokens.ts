export const HOSTPLANE_API_CONFIG = Symbol('HOSTPLANE_API_CONFIG')
export const HOSTPLANE_API_STORE = Symbol('HOSTPLANE_API_STORE')
export const HOSTPLANE_API_LOGGER = Symbol('HOSTPLANE_API_LOGGER')
