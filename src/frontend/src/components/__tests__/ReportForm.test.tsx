import { describe, it, expect, vi } from 'vitest'
import { render, screen } from '@testing-library/react'
import userEvent from '@testing-library/user-event'
import ReportForm from '../ReportForm'
import { getFaultInfo } from '../../lib/faultInfo'
import { toPrediction } from '../../model/probabilities'
import type { ServiceOffice } from '../../types'

const office: ServiceOffice = {
  name: 'Test Service Office',
  email: 'office@test.example',
  phone: '+91-11-4000-1000',
  address: '1 Test Road',
  workingHours: 'Mon-Fri, 9:00 AM - 5:00 PM',
}

const prediction = toPrediction([0.05, 0.05, 0.05, 0.05, 0.65, 0.05, 0.05, 0.05])

function renderForm() {
  const onReportGenerated = vi.fn()
  render(
    <ReportForm
      prediction={prediction}
      faultInfo={getFaultInfo(prediction.label)}
      postalCode="110001"
      office={office}
      onReportGenerated={onReportGenerated}
    />
  )
  return { onReportGenerated, user: userEvent.setup() }
}

describe('ReportForm', () => {
  it('should show a validation message and not generate a report when fields are missing', async () => {
    const { onReportGenerated, user } = renderForm()

    await user.type(screen.getByLabelText('Phone Number *'), '12345')
    await user.type(screen.getByLabelText('Email Address *'), 'user@test.example')
    await user.click(screen.getByRole('button', { name: /send report to office/i }))

    expect(screen.getByRole('alert')).toHaveTextContent('Please fill in all required fields (marked with *)')
    expect(screen.getByText('Name is required')).toBeInTheDocument()
    expect(screen.getByLabelText('Your Name *')).toHaveAttribute('aria-invalid', 'true')
    expect(onReportGenerated).not.toHaveBeenCalled()
  })

  it('should pass the generated report to the caller', async () => {
    const { onReportGenerated, user } = renderForm()

    await user.type(screen.getByLabelText('Your Name *'), 'Test User')
    await user.type(screen.getByLabelText('Phone Number *'), '12345')
    await user.type(screen.getByLabelText('Email Address *'), 'user@test.example')
    await user.type(screen.getByLabelText('Additional Notes (Optional)'), 'Cracked corner')
    await user.click(screen.getByRole('button', { name: /send report to office/i }))

    expect(onReportGenerated).toHaveBeenCalledTimes(1)
    const [generated] = onReportGenerated.mock.calls[0]
    expect(generated.report.faultDetection.faultType).toBe('Cell Breakage')
    expect(generated.report.faultDetection.confidence).toBe('65.0%')
    expect(generated.report.additionalNotes).toBe('Cracked corner')
    expect(generated.report.userDetails.pincode).toBe('110001')
    expect(screen.queryByRole('alert')).not.toBeInTheDocument()
  })
})
