import { formatPrice } from "./pricing";

export interface Item {
  sku: string;
  price: number;
}

export class Inventory {
  private items = new Map<string, Item>();

  add(item: Item): void {
    this.items.set(item.sku, item);
  }

  describe(sku: string): string {
    const item = this.items.get(sku);
    return item ? `${item.sku}: ${formatPrice(item.price)}` : "unknown";
  }
}
