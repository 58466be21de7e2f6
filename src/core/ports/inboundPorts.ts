import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";

export type LocatedCompany = {
  profileUrl: string;
  html: string;
};

export type CompanySearchHit = {
  name: string;
  profileUrl: string;
};

export interface CompanyLocatorPort {
  locate(symbol: string): Promise<Result<LocatedCompany, AppBoundaryError>>;
  search(query: string): Promise<Result<CompanySearchHit[], AppBoundaryError>>;
}
