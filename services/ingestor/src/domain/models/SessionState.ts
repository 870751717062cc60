/**
 * フィードセッションの状態。
 *
 * disconnected --connect--> connecting --auth--> authenticating --success--> active
 * active --close/error--> closing --> disconnected
 */
export type SessionState = 'disconnected' | 'connecting' | 'authenticating' | 'active' | 'closing';
