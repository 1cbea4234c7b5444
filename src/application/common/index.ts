export * from './either';
