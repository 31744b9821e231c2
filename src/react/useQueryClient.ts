import { useContext } from 'react'
import type { QueryClient } from '@core/index'
import { QueryClientContext } from './QueryClientProvider'

export function useQueryClient(): QueryClient {
  const client = useContext(QueryClientContext)
  if (!client) {
    throw new Error('useQueryClient must be used within a QueryClientProvider')
  }
  return client
}
