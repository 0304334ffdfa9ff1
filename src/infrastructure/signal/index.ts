export { Signal, type Listener, type Connection } from './signal.js';
