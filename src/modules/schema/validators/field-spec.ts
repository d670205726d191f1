interface BaseField {
  required: boolean;
  description?: string;
}

export type FieldSpec =
  | (BaseField & { kind: 'string'; pattern?: string; enum?: readonly string[] })
  | (BaseField & { kind: 'number'; minimum?: number })
  | (BaseField & { kind: 'bool' })
  | (BaseField & { kind: 'date' })
  | (BaseField & { kind: 'objectId' })
  | (BaseField & { kind: 'stringArray' });

export type FieldKind = FieldSpec['kind'];

export type CollectionSchema = Readonly<Record<string, FieldSpec>>;

export interface JsonSchemaProperty {
  bsonType: string;
  description?: string;
  pattern?: string;
  enum?: readonly string[];
  minimum?: number;
  items?: { bsonType: string };
}

export interface JsonSchemaValidator {
  $jsonSchema: {
    bsonType: 'object';
    required: string[];
    properties: Record<string, JsonSchemaProperty>;
  };
}

// "number" is the $jsonSchema alias matching int, long, double and decimal
const BSON_TYPES: Record<FieldKind, string> = {
  string: 'string',
  number: 'number',
  bool: 'bool',
  date: 'date',
  objectId: 'objectId',
  stringArray: 'array',
};

function toProperty(field: FieldSpec): JsonSchemaProperty {
  const property: JsonSchemaProperty = { bsonType: BSON_TYPES[field.kind] };
  if (field.description) property.description = field.description;

  switch (field.kind) {
    case 'string':
      if (field.pattern !== undefined) property.pattern = field.pattern;
      if (field.enum !== undefined) property.enum = field.enum;
      break;
    case 'number':
      if (field.minimum !== undefined) property.minimum = field.minimum;
      break;
    case 'stringArray':
      property.items = { bsonType: 'string' };
      break;
  }
  return property;
}

/** Renders a collection schema into the document `collMod` expects as `validator`. */
export function toJsonSchemaValidator(schema: CollectionSchema): JsonSchemaValidator {
  const required: string[] = [];
  const properties: Record<string, JsonSchemaProperty> = {};

  for (const [name, field] of Object.entries(schema)) {
    if (field.required) required.push(name);
    properties[name] = toProperty(field);
  }

  return { $jsonSchema: { bsonType: 'object', required, properties } };
}
