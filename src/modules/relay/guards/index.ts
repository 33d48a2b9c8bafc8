export * from './admin-auth.guard';
