export { QueueTransportAdapter } from './queue-transport.adapter';
