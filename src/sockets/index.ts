export { InputSocket } from './input-socket.js';
export { OutputSocket } from './output-socket.js';
export type { InputSocketOptions, OutputSocketOptions, SocketDirection, SocketOwner } from './types.js';
