export interface ProductInfo {
  id: string;
  title: string;
  price: number;
  floorPrice: number;
  description: string;
  condition: string;
  category: string;
  shipping: boolean;
  zone: string;
}
