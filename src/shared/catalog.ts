export interface Product {
  id: number;
  code: string;
  description: string | null;
  uom: string;
  buyPrice: number;
  sellPrice: number;
  defaultNumber: number;
  stock: number;
  reorderLevel: number;
}

/** A product before it has been persisted; `id` is absent for new products. */
export interface ProductInput {
  id?: number | null;
  code: string;
  description?: string | null;
  uom?: string;
  buyPrice?: number;
  sellPrice?: number;
  defaultNumber?: number;
  stock?: number;
  reorderLevel?: number;
}
