export interface CartItem {
  userId: string;
  itemId: string;
  quantity: number;
  addedAt: Date;
}

export interface CartLineView {
  itemId: string;
  title: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
  available: boolean;
}

export interface CartView {
  userId: string;
  items: CartLineView[];
  currency: string;
  totalAmount: number;
}
