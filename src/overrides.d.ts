export {};

declare module 'graphql' {
  // internal key under which a coerced argument is passed to the resolver
  interface GraphQLArgumentExtensions {
    outName?: string;
  }

  // internal key under which a coerced input field is stored
  interface GraphQLInputFieldExtensions {
    outName?: string;
  }
}
