export * from './mock-transport.adapter';
