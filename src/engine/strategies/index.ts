export { first_strategy } from './first-strategy';
export { random_strategy, create_random_strategy } from './random-strategy';
