export * from './RegistrationStore';
export * from './DialogStore';
