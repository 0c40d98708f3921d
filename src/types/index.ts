export type * from './collaborators';
export type * from './options';
export type * from './request';
