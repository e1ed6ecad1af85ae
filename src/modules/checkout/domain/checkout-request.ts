export interface CheckoutItem {
  productId: string;
  quantity: number;
}

export interface ShippingAddress {
  streetAddress: string;
  city: string;
  state?: string;
  country: string;
  zipCode: string;
}

export interface CheckoutRequest {
  userId: string;
  items: CheckoutItem[];
  shippingAddress: ShippingAddress;
  paymentToken: string;
  currencyCode: string;
  email?: string;
}
