export type * from './game.type';
export type * from './step.type';
