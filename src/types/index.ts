export type * from './api';
export type * from './providers';
export type * from './persona';
export type * from './dispatch';
export type * from './session';
export type * from './quiz';
