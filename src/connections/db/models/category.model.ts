// Category Model

export interface Category {
  id: number;
  name: string; // unique
  description: string | null;
  is_active: boolean; // default: true - inactive categories are hidden from listings, their products stay
  created_at: Date;
  updated_at: Date;
}

export interface CategoryFields {
  name: string;
  description: string | null;
  is_active?: boolean;
}
