import { Hammer, IndianRupee, Search, ShieldCheck } from 'lucide-react'
import SeverityBadge from './SeverityBadge'
import { HEALTHY_CATEGORY, type FaultCategory, type FaultInfo } from '../types'

interface FaultDetailsProps {
  label: FaultCategory
  info: FaultInfo
}

export default function FaultDetails({ label, info }: FaultDetailsProps) {
  return (
    <div className="space-y-6">
      <section>
        <h4 className="font-medium text-gray-700 mb-2">Fault Description</h4>
        <p className="text-gray-600">{info.description || 'No description available.'}</p>
        {label !== HEALTHY_CATEGORY && (
          <div className="mt-3 flex items-center gap-2">
            <span className="text-sm text-gray-500">Severity</span>
            <SeverityBadge level={info.severity} compact />
          </div>
        )}
      </section>

      {info.symptoms && info.symptoms.length > 0 && (
        <section>
          <h4 className="flex items-center gap-2 font-medium text-gray-700 mb-2">
            <Search className="h-4 w-4" />
            Symptoms
          </h4>
          <ul className="list-disc pl-5 space-y-1 text-gray-600">
            {info.symptoms.map((symptom) => (
              <li key={symptom}>{symptom}</li>
            ))}
          </ul>
        </section>
      )}

      <section>
        <h4 className="flex items-center gap-2 font-medium text-gray-700 mb-2">
          <Hammer className="h-4 w-4" />
          Repair Instructions
        </h4>
        <ol className="list-decimal pl-5 space-y-1 text-gray-600">
          {info.repairSteps.map((step) => (
            <li key={step}>{step}</li>
          ))}
        </ol>
      </section>

      <section>
        <h4 className="flex items-center gap-2 font-medium text-gray-700 mb-2">
          <ShieldCheck className="h-4 w-4" />
          Prevention Tips
        </h4>
        <ul className="list-disc pl-5 space-y-1 text-gray-600">
          {info.prevention.map((tip) => (
            <li key={tip}>{tip}</li>
          ))}
        </ul>
      </section>

      {info.costEstimate && (
        <section className="pt-4 border-t">
          <p className="flex items-center gap-2 text-gray-700">
            <IndianRupee className="h-4 w-4" />
            Estimated Repair Cost: <span className="font-semibold">{info.costEstimate}</span>
          </p>
        </section>
      )}
    </div>
  )
}
