export * from './errors';
export * from './report';
export * from './bencher';
