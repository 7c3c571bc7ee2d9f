export interface CatalogItem {
  itemId: string;
  title: string;
  /** Minor units (cents). */
  price: number;
  currency: string;
  available: boolean;
}
