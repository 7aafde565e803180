export * from './http-timestamp-authority.adapter';
