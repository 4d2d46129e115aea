export interface ByteRange {
  offset: number;
  size: number;
}

export type FormattedValue =
  | null
  | string
  | number
  | boolean
  | bigint
  | FormattedValue[]
  | { [key: string]: FormattedValue }
  | { variant: string; value: FormattedValue | null };

export interface FormattedReflection {
  typeName: string | undefined;
  kind: string;
  value: FormattedValue;
  byteRange: ByteRange;
}
