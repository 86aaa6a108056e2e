export type RawRow = Record<string, string | undefined>;

export type ComponentRecord = {
  id: string;
  category: string;
  name: string;
  brand: string | null;
  price: number | null;
  previousPrice: number | null;
  imageUrl: string | null;
  productUrl: string | null;
  inStock: boolean;
  stockUnits: number;
  lastUpdated: Date;
};

export type AttributeRecord = {
  componentId: string;
  key: string;
  value: string;
};

export type TagRecord = {
  componentId: string;
  tag: string;
};

export type NormalizedRow = {
  component: ComponentRecord;
  attributes: AttributeRecord[];
  tags: TagRecord[];
};

export type CsvRow = {
  line: number;
  values: RawRow;
};

export type RowRejection = {
  line: number;
  message: string;
};

export type CatalogFile = {
  path: string;
  fileName: string;
  stem: string;
  category: string;
};
