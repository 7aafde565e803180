export * from './mock-timestamp-authority.adapter';
