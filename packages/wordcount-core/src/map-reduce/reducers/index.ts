/**
 * Reducers
 */

export { SumReducer, createSumReducer } from './sum-reducer';
