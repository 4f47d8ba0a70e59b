export { Conn } from './api';
export { Config, ConfigBuilder } from './config';
