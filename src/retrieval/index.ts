export { Retriever, type RetrieveOptions } from './Retriever.js';
