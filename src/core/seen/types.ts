// src/core/seen/types.ts

export interface SeenStoreConfig {
  backend: 'memory' | 'redis' | 'postgres';
  url?: string;
  namespace?: string; // Separates several printers sharing one backend (default: 'default')
}
