export * from './body-size.guard';
