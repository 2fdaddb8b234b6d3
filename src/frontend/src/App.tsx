import { useState } from 'react'
import { Routes, Route } from 'react-router-dom'
import Layout from './components/Layout'
import Inference from './pages/Inference'
import FaultGuide from './pages/FaultGuide'
import type { GeneratedReport } from './types'

function App() {
  // Session-scoped: lives only as long as the page.
  const [report, setReport] = useState<GeneratedReport | null>(null)

  return (
    <Layout report={report}>
      <Routes>
        <Route path="/" element={<Inference onReportChange={setReport} />} />
        <Route path="/faults" element={<FaultGuide />} />
      </Routes>
    </Layout>
  )
}

export default App
