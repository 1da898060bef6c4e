export {
  array,
  bool,
  field,
  int,
  nullable,
  record,
  str,
  SchemaError,
  type Decoder,
} from './decoders';
