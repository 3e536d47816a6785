import type { Principal } from "@/backend/domain/principal";

export interface PrincipalResolver {
  resolve(sessionToken?: string | null, refreshToken?: string | null): Promise<Principal>;
  logout(refreshToken: string): Promise<boolean>;
}
