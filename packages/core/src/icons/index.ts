export { IconStore, PLACEHOLDER_ICON } from './icon-store.js';
