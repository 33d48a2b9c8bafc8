import { InitialSchema1700000000000 } from './1700000000000-InitialSchema';

export { InitialSchema1700000000000 };

export const RELAY_MIGRATIONS = [InitialSchema1700000000000];
