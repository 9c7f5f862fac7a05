export type { Line, InputSource, LineWriter } from './line';
