export interface IpSourceClient {
  fetchList(url: string): Promise<string>;
}
