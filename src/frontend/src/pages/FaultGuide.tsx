import FaultDetails from '../components/FaultDetails'
import SeverityBadge from '../components/SeverityBadge'
import { FAULT_INFO } from '../lib/faultInfo'
import { HEALTHY_CATEGORY } from '../types'

export default function FaultGuide() {
  return (
    <div className="max-w-4xl mx-auto space-y-6">
      {[...FAULT_INFO].map(([category, info]) => (
        <div key={category} className="bg-white rounded-lg shadow p-6">
          <div className="flex items-start justify-between mb-4">
            <h2 className="text-lg font-semibold text-gray-900">{category}</h2>
            {category !== HEALTHY_CATEGORY && <SeverityBadge level={info.severity} />}
          </div>
          <FaultDetails label={category} info={info} />
        </div>
      ))}
    </div>
  )
}
