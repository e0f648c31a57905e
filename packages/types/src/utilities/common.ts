/** Lower-case RFC 4122 version 4 identifier. */
export type UUID = string & { readonly __brand: "UUID" };

/** UTC timestamp exactly as `Date#toISOString()` renders it. */
export type ISODateString = string & { readonly __brand: "ISODateString" };
