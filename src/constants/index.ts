/**
 * Constants barrel
 *
 * Technical constants never change; signal constants are the tuned tables
 * of the scoring pipeline.
 */

export * from './technical.constants';
export * from './signal.constants';
