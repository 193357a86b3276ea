/** Directives for defer/stream support */
export { GraphQLDeferDirective, GraphQLStreamDirective } from './directives';
