import { describe, it, expect, vi } from 'vitest'
import { render, screen } from '@testing-library/react'
import userEvent from '@testing-library/user-event'
import OfficeFinder from '../OfficeFinder'

describe('OfficeFinder', () => {
  it('should look up the office once enough digits are typed', async () => {
    const onLookup = vi.fn()
    const user = userEvent.setup()
    render(<OfficeFinder onLookup={onLookup} />)

    await user.type(screen.getByPlaceholderText('e.g., 110001, 400001'), '1100')

    expect(screen.getByText('Nearest Service Office')).toBeInTheDocument()
    expect(screen.getByText(/Email: central\.delhi@solarcare\.example/)).toBeInTheDocument()
    expect(onLookup).toHaveBeenLastCalledWith({
      postalCode: '1100',
      office: expect.objectContaining({ name: 'Central Delhi Service Office' }),
    })
  })

  it('should show an informational message when no office matches', async () => {
    const onLookup = vi.fn()
    const user = userEvent.setup()
    render(<OfficeFinder onLookup={onLookup} />)

    await user.type(screen.getByPlaceholderText('e.g., 110001, 400001'), '000000')

    expect(
      screen.getByText('No service office found for this pincode. Please contact our main office.')
    ).toBeInTheDocument()
    expect(onLookup).toHaveBeenLastCalledWith({ postalCode: '000000', office: undefined })
  })

  it('should ask for a pincode when searching with an empty field', async () => {
    const onLookup = vi.fn()
    const user = userEvent.setup()
    render(<OfficeFinder onLookup={onLookup} />)

    await user.click(screen.getByRole('button', { name: /find office/i }))

    expect(screen.getByText('Please enter a pincode to find the nearest service office.')).toBeInTheDocument()
    expect(onLookup).toHaveBeenCalledWith(null)
  })
})
