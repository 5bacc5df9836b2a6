export * from './ApiServer';
export * from './routes';
export * from './controllers';
