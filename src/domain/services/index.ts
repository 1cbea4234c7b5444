export { Cafe } from './cafe.service';
