import { createContext, useEffect, type ReactNode } from 'react'
import type { QueryClient } from '@core/index'

export const QueryClientContext = createContext<QueryClient | null>(null)

export function QueryClientProvider({
  client,
  children,
}: {
  client: QueryClient
  children: ReactNode
}) {
  useEffect(() => {
    client.mount()
    return () => client.unmount()
  }, [client])

  return (
    <QueryClientContext.Provider value={client}>
      {children}
    </QueryClientContext.Provider>
  )
}
