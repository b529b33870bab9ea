export const USER_ROLES = ['ADMIN', 'CASHIER'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export interface User {
  id: number;
  username: string;
  passwordHash: string;
  displayName: string;
  role: UserRole;
  createdAt: string;
}

export interface SaveUserInput {
  username: string;
  displayName: string;
  role: UserRole;
  password?: string | null;
}

export function normalizeUsername(username: string | null | undefined): string {
  return (username || '').trim().toLowerCase();
}
