export interface User {
  id: number;
  email: string;
  username: string;
  hashedPassword: string;
  fullName: string | null;
  isActive: boolean;
  isSuperuser: boolean;
  createdAt: Date;
  updatedAt: Date;
  lastLogin: Date | null;
}

export interface NewUser {
  email: string;
  username: string;
  hashedPassword: string;
  fullName?: string | null;
}
