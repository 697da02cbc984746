export const ENGINE_CONFIG = Symbol('ENGINE_CONFIG');
