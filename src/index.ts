export * from './parser/index';
export * from './sim/stats';
export * from './sim/typeChart';
export * from './sim/simulate';
export * from './sim/legacy';
export * from './sim/ranking';
export * from './report';
export * from './config';
export * from './input';
