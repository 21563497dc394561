export { searchPaths, searchTitles, searchIdentities } from './search.js';
