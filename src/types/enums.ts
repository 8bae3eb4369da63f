export enum ErrorCode {
  INVALID_SCHEME = 'INVALID_SCHEME',
  INVALID_USER_INFO = 'INVALID_USER_INFO',
  INVALID_HOST = 'INVALID_HOST',
  INVALID_IP_LITERAL = 'INVALID_IP_LITERAL',
  INVALID_PORT = 'INVALID_PORT',
  INVALID_PATH = 'INVALID_PATH',
  INVALID_QUERY = 'INVALID_QUERY',
  INVALID_FRAGMENT = 'INVALID_FRAGMENT',
  INVALID_PERCENT_ENCODING = 'INVALID_PERCENT_ENCODING'
}

export enum UriComponent {
  SCHEME = 'SCHEME',
  USER_INFO = 'USER_INFO',
  HOST = 'HOST',
  PORT = 'PORT',
  PATH = 'PATH',
  QUERY = 'QUERY',
  FRAGMENT = 'FRAGMENT'
}
