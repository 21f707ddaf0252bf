import { StrictMode, Component } from 'react'
import type { ReactNode } from 'react'
import { createRoot } from 'react-dom/client'
import App from './App'

interface LayoutErrorBoundaryState { error: Error | null }

/**
 * The engine throws when a layout fails validation (bad dimensions, duplicate
 * section ids).  Show the message and let the user start again from the demo
 * layout, which remounts App with its initial state.
 */
class LayoutErrorBoundary extends Component<{ children: ReactNode }, LayoutErrorBoundaryState> {
  state: LayoutErrorBoundaryState = { error: null }
  static getDerivedStateFromError(error: Error) { return { error } }
  render() {
    if (this.state.error) {
      return (
        <div style={{ padding: '1.5rem', fontFamily: 'system-ui, sans-serif' }}>
          <h2 style={{ color: '#c53030', margin: '0 0 0.5rem' }}>Layout could not be evaluated</h2>
          <pre style={{ whiteSpace: 'pre-wrap', color: '#4a5568' }}>{this.state.error.message}</pre>
          <button onClick={() => this.setState({ error: null })}>Reset to demo layout</button>
        </div>
      )
    }
    return this.props.children
  }
}

const container = document.getElementById('root')
if (!container) throw new Error('Missing #root element')

createRoot(container).render(
  <StrictMode>
    <LayoutErrorBoundary>
      <App />
    </LayoutErrorBoundary>
  </StrictMode>,
)
