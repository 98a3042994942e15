export interface RawProviderItem<T = unknown> {
  provider: string;
  fetchedAt: string;
  raw: T;
}
