import { useState } from 'react'
import { AlertCircle, Mail, Upload } from 'lucide-react'
import FaultDetails from '../components/FaultDetails'
import OfficeFinder, { type OfficeLookup } from '../components/OfficeFinder'
import ProbabilityList from '../components/ProbabilityList'
import ReportForm from '../components/ReportForm'
import ReportSummary from '../components/ReportSummary'
import ResultBanner from '../components/ResultBanner'
import { usePrediction, useSolarModel } from '../hooks/useSolarModel'
import { getFaultInfo, severityTone } from '../lib/faultInfo'
import { ACCEPTED_IMAGE_TYPES, isAcceptedImageFile, readAsDataUrl } from '../lib/image'
import { rankProbabilities } from '../model/probabilities'
import { HEALTHY_CATEGORY, type GeneratedReport } from '../types'

interface InferenceProps {
  onReportChange: (report: GeneratedReport | null) => void
}

export default function Inference({ onReportChange }: InferenceProps) {
  const [preview, setPreview] = useState<string | null>(null)
  const [uploadError, setUploadError] = useState<string | null>(null)
  const [lookup, setLookup] = useState<OfficeLookup | null>(null)
  const [generated, setGenerated] = useState<GeneratedReport | null>(null)

  const model = useSolarModel()
  const prediction = usePrediction(model.data)

  const resetDownstream = () => {
    setLookup(null)
    setGenerated(null)
    onReportChange(null)
  }

  const handleImageUpload = async (event: React.ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0]
    event.target.value = ''
    if (!file) return

    if (!isAcceptedImageFile(file)) {
      setUploadError('Please upload a JPG or PNG image.')
      return
    }

    setUploadError(null)
    resetDownstream()
    try {
      setPreview(await readAsDataUrl(file))
    } catch (error) {
      setUploadError(error instanceof Error ? error.message : 'Could not read the image.')
      return
    }
    prediction.mutate(file)
  }

  const handleRemove = () => {
    setPreview(null)
    prediction.reset()
    resetDownstream()
  }

  const handleReport = (report: GeneratedReport) => {
    setGenerated(report)
    onReportChange(report)
  }

  const result = prediction.data
  const faultInfo = result ? getFaultInfo(result.label) : undefined

  return (
    <div className="max-w-6xl mx-auto space-y-6">
      <div className="bg-white rounded-lg shadow p-6">
        <h2 className="text-xl font-semibold text-gray-900 mb-6">Run Fault Detection</h2>

        {model.isError && (
          <div role="alert" className="mb-6 p-3 bg-red-50 border border-red-200 rounded-lg flex items-center gap-2">
            <AlertCircle className="h-5 w-5 text-red-600 flex-shrink-0" />
            <span className="text-red-800">
              {model.error instanceof Error ? model.error.message : 'The fault classifier could not be loaded.'}
            </span>
          </div>
        )}

        <p className="block text-sm font-medium text-gray-700 mb-2">Solar Panel EL Image</p>
        <div className="border-2 border-dashed border-gray-300 rounded-lg p-6 text-center hover:border-primary-400 transition-colors">
          {preview ? (
            <div>
              <img src={preview} alt="Uploaded EL" className="max-h-72 mx-auto rounded" />
              <button onClick={handleRemove} className="mt-2 text-sm text-red-600 hover:text-red-800">
                Remove
              </button>
            </div>
          ) : (
            <label className="cursor-pointer">
              <Upload className="h-12 w-12 mx-auto text-gray-400 mb-2" />
              <span className="text-sm text-gray-500">
                {model.isPending ? 'Loading classifier...' : 'Click to upload an EL image (JPG or PNG)'}
              </span>
              <input
                type="file"
                accept={ACCEPTED_IMAGE_TYPES.join(',')}
                disabled={!model.data}
                onChange={(e) => void handleImageUpload(e)}
                className="hidden"
              />
            </label>
          )}
        </div>

        {uploadError && <p className="mt-2 text-sm text-red-600">{uploadError}</p>}
        {prediction.isPending && <p className="mt-4 text-gray-500">Analyzing image...</p>}
        {prediction.isError && (
          <p className="mt-4 text-sm text-red-600">
            {prediction.error instanceof Error ? prediction.error.message : 'Analysis failed.'}
          </p>
        )}
      </div>

      {result && faultInfo && (
        <div className="bg-white rounded-lg shadow p-6 space-y-6">
          <h3 className="text-xl font-semibold text-gray-900">Detection Result</h3>
          <ResultBanner prediction={result} tone={severityTone(result.label, faultInfo)} />
          <FaultDetails label={result.label} info={faultInfo} />
          <ProbabilityList ranking={rankProbabilities(result.distribution)} />
        </div>
      )}

      {result && faultInfo && (
        <div className="bg-white rounded-lg shadow p-6 space-y-6">
          <OfficeFinder
            onLookup={(next) => {
              setLookup(next)
              setGenerated(null)
            }}
          />

          {lookup?.office && result.label !== HEALTHY_CATEGORY && (
            <div className="pt-6 border-t">
              <h4 className="flex items-center gap-2 font-medium text-gray-700 mb-4">
                <Mail className="h-4 w-4" />
                Send Fault Report to Office
              </h4>
              {generated ? (
                <ReportSummary generated={generated} />
              ) : (
                <ReportForm
                  prediction={result}
                  faultInfo={faultInfo}
                  postalCode={lookup.postalCode}
                  office={lookup.office}
                  onReportGenerated={handleReport}
                />
              )}
            </div>
          )}
        </div>
      )}
    </div>
  )
}
