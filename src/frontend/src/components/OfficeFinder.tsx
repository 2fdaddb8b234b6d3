import { useState } from 'react'
import { Building2, Info, MapPin, Search } from 'lucide-react'
import { MIN_POSTAL_CODE_LENGTH, findNearestOffice, formatContactInfo } from '../lib/officeLocator'
import type { ServiceOffice } from '../types'

export interface OfficeLookup {
  postalCode: string
  office: ServiceOffice | undefined
}

interface OfficeFinderProps {
  onLookup: (lookup: OfficeLookup | null) => void
}

export default function OfficeFinder({ onLookup }: OfficeFinderProps) {
  const [postalCode, setPostalCode] = useState('')
  const [lookup, setLookup] = useState<OfficeLookup | null>(null)
  const [showHint, setShowHint] = useState(false)

  const runLookup = (code: string) => {
    if (!code.trim()) {
      setLookup(null)
      setShowHint(true)
      onLookup(null)
      return
    }
    const result = { postalCode: code, office: findNearestOffice(code) }
    setShowHint(false)
    setLookup(result)
    onLookup(result)
  }

  const handleChange = (value: string) => {
    setPostalCode(value)
    if (value.trim().length >= MIN_POSTAL_CODE_LENGTH) {
      runLookup(value)
    } else if (lookup) {
      setLookup(null)
      onLookup(null)
    }
  }

  return (
    <div className="space-y-4">
      <h4 className="flex items-center gap-2 font-medium text-gray-700">
        <MapPin className="h-4 w-4" />
        Find Nearest Service Office
      </h4>

      <form
        className="flex gap-3"
        onSubmit={(event) => {
          event.preventDefault()
          runLookup(postalCode)
        }}
      >
        <label className="flex-1">
          <span className="sr-only">Pincode / Zip Code</span>
          <input
            type="text"
            value={postalCode}
            onChange={(e) => handleChange(e.target.value)}
            placeholder="e.g., 110001, 400001"
            className="w-full px-3 py-2 border border-gray-300 rounded-lg focus:outline-none focus:ring-2 focus:ring-primary-400"
          />
        </label>
        <button
          type="submit"
          className="flex items-center gap-2 py-2 px-4 bg-primary-600 text-white rounded-lg font-medium hover:bg-primary-700 transition-colors"
        >
          <Search className="h-4 w-4" />
          Find Office
        </button>
      </form>

      {showHint && (
        <p className="flex items-center gap-2 text-sm text-blue-700">
          <Info className="h-4 w-4" />
          Please enter a pincode to find the nearest service office.
        </p>
      )}

      {lookup && !lookup.office && (
        <div className="p-3 bg-yellow-50 border border-yellow-200 rounded-lg text-yellow-800">
          No service office found for this pincode. Please contact our main office.
        </div>
      )}

      {lookup?.office && (
        <div className="p-4 border rounded-lg">
          <p className="flex items-center gap-2 font-medium text-gray-700 mb-2">
            <Building2 className="h-4 w-4" />
            Nearest Service Office
          </p>
          <pre className="whitespace-pre-wrap font-sans text-gray-600">{formatContactInfo(lookup.office)}</pre>
        </div>
      )}
    </div>
  )
}
