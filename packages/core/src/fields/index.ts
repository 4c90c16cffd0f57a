export { compareFieldValues, fieldsEqual, getField, isRecord, materialize } from './fields.js';
