export * from './admin-audit.interceptor';
