export type SessionErrorCode =
  | 'E_BIND'
  | 'E_HANDLER'
  | 'E_WINDOW_CLOSED'
  | 'E_READY_TIMEOUT'
  | 'E_PAGE_INIT'
  | 'E_NOT_SERVING'
  | 'E_SESSION_STATE'
  | 'E_CONFIG'

export type BridgeErrorCode = 'E_REMOTE_EVAL'

export type ShellErrorCode = 'E_SPAWN' | 'E_CDP_TIMEOUT' | 'E_NO_PAGE'

/**
 * Union of all error codes produced by the library, useful for branching on `code`.
 */
export type ErrorCode = SessionErrorCode | BridgeErrorCode | ShellErrorCode
