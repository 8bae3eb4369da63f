export interface UriComponents {
  scheme: string;
  userInfo: string;
  host: string;
  hasPort: boolean;
  port: number;
  path: string[];
  query: string;
  fragment: string;
}

export interface Authority {
  userInfo: string;
  host: string;
  hasPort: boolean;
  port: number;
}
