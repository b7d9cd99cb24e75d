export type ToastType = 'success' | 'error' | 'info' | 'warning'

export interface Toast {
  id: string
  type: ToastType
  message: string
  duration?: number
}

/** Outcome of the last user-facing operation */
export interface OperationResult {
  type: 'success' | 'error'
  message: string
}
