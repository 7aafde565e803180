// Interface and type exports
export * from './common.types';
export * from './correlation-store.adapter';
export * from './transport.adapter';
export * from './timestamp-authority.adapter';
