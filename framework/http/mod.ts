/**
 * HTTP/Server Layer
 *
 * Node transport for the dispatcher.
 */

export { Server, parseRequestTarget, toDispatchRequest, type ServerOptions } from './server.ts';
